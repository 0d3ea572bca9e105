import { describe, expect, it } from "vitest";
import { InvalidInputError, RemoteApiError } from "../src/errors.js";
import { openPullRequest } from "../src/publish/pull-request-opener.js";
import { ORG_URL } from "./support/fake-azure-devops.js";
import { PROJECT, REPO_ID, failWith, narrow, run, widgetsFake } from "./support/harness.js";

describe("openPullRequest", () => {
  it("creates a pull request from the source into the target", async () => {
    const fake = widgetsFake({ "refs/heads/main": "aaa111", "refs/heads/work": "bbb222" });

    const pr = await run(
      fake,
      openPullRequest(PROJECT, REPO_ID, "refs/heads/work", "refs/heads/main", "Refresh README", "Details")
    );

    expect(pr).toEqual({
      id: 100,
      url: `${ORG_URL}/Platform/_apis/git/repositories/${REPO_ID}/pullRequests/100`,
      sourceRef: "refs/heads/work",
      targetRef: "refs/heads/main",
      title: "Refresh README",
      description: "Details",
    });
    expect(fake.callsTo("pullrequests")[0]?.body).toEqual({
      sourceRefName: "refs/heads/work",
      targetRefName: "refs/heads/main",
      title: "Refresh README",
      description: "Details",
    });
  });

  it("uses the web link when the response carries one", async () => {
    const fake = widgetsFake({});
    fake.failNext("pullrequests", 201, {
      pullRequestId: 42,
      url: "https://dev.azure.com/test-org/_apis/git/pullRequests/42",
      sourceRefName: "refs/heads/work",
      targetRefName: "refs/heads/main",
      title: "T",
      _links: { web: { href: "https://dev.azure.com/test-org/Platform/_git/widgets/pullrequest/42" } },
    });

    const pr = await run(
      fake,
      openPullRequest(PROJECT, REPO_ID, "refs/heads/work", "refs/heads/main", "T")
    );

    expect(pr.webUrl).toBe("https://dev.azure.com/test-org/Platform/_git/widgets/pullrequest/42");
    expect(pr.description).toBe("");
  });

  it("surfaces the server's rejection of a duplicate verbatim", async () => {
    const fake = widgetsFake({});
    const open = openPullRequest(PROJECT, REPO_ID, "refs/heads/work", "refs/heads/main", "T");
    await run(fake, open);

    const error = await failWith(fake, open);

    const remote = narrow(error, RemoteApiError);
    expect(remote.statusCode).toBe(409);
    expect(remote.body).toEqual({
      message: "TF401179: An active pull request for the source and target branch already exists.",
      typeKey: "GitPullRequestExistsException",
    });
  });

  it("refuses identical source and target refs", async () => {
    const fake = widgetsFake({});

    const error = await failWith(
      fake,
      openPullRequest(PROJECT, REPO_ID, "refs/heads/main", "refs/heads/main", "T")
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(fake.calls).toHaveLength(0);
  });
});
