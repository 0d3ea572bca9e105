import { describe, expect, it } from "vitest";
import {
  ConcurrencyConflictError,
  MalformedResponseError,
  RefUpdateRejectedError,
} from "../src/errors.js";
import { planBranchUpdate, publishBranch } from "../src/publish/branch-publisher.js";
import { RefLookup, ZERO_OBJECT_ID } from "../src/types.js";
import { PROJECT, REPO_ID, failWith, narrow, run, widgetsFake } from "./support/harness.js";

const WORK = "refs/heads/work";

describe("planBranchUpdate", () => {
  it("creates a missing branch from the zero object id", () => {
    expect(planBranchUpdate(RefLookup.NotFound({ refName: WORK }), "aaa111")).toEqual({
      action: "created",
      oldObjectId: ZERO_OBJECT_ID,
    });
  });

  it("resets an existing branch from its observed tip", () => {
    const lookup = RefLookup.Found({ pointer: { refName: WORK, objectId: "ccc333" } });
    expect(planBranchUpdate(lookup, "bbb222")).toEqual({
      action: "reset",
      oldObjectId: "ccc333",
    });
  });

  it("marks a branch already at the base tip as unchanged", () => {
    const lookup = RefLookup.Found({ pointer: { refName: WORK, objectId: "bbb222" } });
    expect(planBranchUpdate(lookup, "bbb222").action).toBe("unchanged");
  });
});

describe("publishBranch", () => {
  it("creates the branch at the base commit", async () => {
    const fake = widgetsFake({ "refs/heads/main": "aaa111" });

    const publication = await run(fake, publishBranch(PROJECT, REPO_ID, WORK, "aaa111"));

    expect(publication).toEqual({
      action: "created",
      pointer: { refName: WORK, objectId: "aaa111" },
    });
    expect(fake.callsTo("refs", "POST").map((call) => call.body)).toEqual([
      [{ name: WORK, oldObjectId: ZERO_OBJECT_ID, newObjectId: "aaa111" }],
    ]);
    expect(fake.tipOf(REPO_ID, WORK)).toBe("aaa111");
  });

  it("force-resets an existing branch to the base commit", async () => {
    const fake = widgetsFake({ "refs/heads/main": "bbb222", [WORK]: "ccc333" });

    const publication = await run(fake, publishBranch(PROJECT, REPO_ID, WORK, "bbb222"));

    expect(publication.action).toBe("reset");
    expect(fake.callsTo("refs", "POST")[0]?.body).toEqual([
      { name: WORK, oldObjectId: "ccc333", newObjectId: "bbb222" },
    ]);
    expect(fake.tipOf(REPO_ID, WORK)).toBe("bbb222");
  });

  it("reports a conflict when the branch moved after it was read", async () => {
    const fake = widgetsFake({ "refs/heads/main": "bbb222", [WORK]: "ccc333" });
    fake.beforeNext(
      (call) => call.resource === "refs" && call.method === "POST",
      () => fake.setRef(REPO_ID, WORK, "ddd444")
    );

    const error = await failWith(fake, publishBranch(PROJECT, REPO_ID, WORK, "bbb222"));

    const conflict = narrow(error, ConcurrencyConflictError);
    expect(conflict.operation).toBe("updateRef");
    expect(conflict.refName).toBe(WORK);
    expect(conflict.expectedObjectId).toBe("ccc333");
    expect(fake.tipOf(REPO_ID, WORK)).toBe("ddd444");
  });

  it("reports a conflict when a missing branch was created concurrently", async () => {
    const fake = widgetsFake({ "refs/heads/main": "aaa111" });
    fake.beforeNext(
      (call) => call.resource === "refs" && call.method === "POST",
      () => fake.setRef(REPO_ID, WORK, "eee555")
    );

    const error = await failWith(fake, publishBranch(PROJECT, REPO_ID, WORK, "aaa111"));

    expect(narrow(error, ConcurrencyConflictError).expectedObjectId).toBe(ZERO_OBJECT_ID);
  });

  it("accepts the numeric stale status", async () => {
    const fake = widgetsFake({ "refs/heads/main": "aaa111" });
    fake.beforeNext(
      (call) => call.resource === "refs" && call.method === "POST",
      () => ({
        status: 200,
        body: { value: [{ name: WORK, success: false, updateStatus: 2 }] },
      })
    );

    const error = await failWith(fake, publishBranch(PROJECT, REPO_ID, WORK, "aaa111"));

    expect(narrow(error, ConcurrencyConflictError).message).toBe(
      "Update of refs/heads/work was not applied"
    );
  });

  it("maps an HTTP 409 on the ref update to a conflict", async () => {
    const fake = widgetsFake({ "refs/heads/main": "aaa111" });
    fake.beforeNext(
      (call) => call.resource === "refs" && call.method === "POST",
      () => ({ status: 409, body: { message: "TF401289: The ref was updated" } })
    );

    const error = await failWith(fake, publishBranch(PROJECT, REPO_ID, WORK, "aaa111"));

    expect(narrow(error, ConcurrencyConflictError).message).toBe(
      "TF401289: The ref was updated"
    );
  });

  it("keeps other rejections distinct from conflicts", async () => {
    const fake = widgetsFake({ "refs/heads/main": "aaa111" });
    fake.beforeNext(
      (call) => call.resource === "refs" && call.method === "POST",
      () => ({
        status: 200,
        body: {
          value: [
            {
              name: WORK,
              success: false,
              updateStatus: "createBranchPermissionRequired",
              customMessage: "TF401027: You need the Git 'CreateBranch' permission.",
            },
          ],
        },
      })
    );

    const error = await failWith(fake, publishBranch(PROJECT, REPO_ID, WORK, "aaa111"));

    const rejected = narrow(error, RefUpdateRejectedError);
    expect(rejected.updateStatus).toBe("createBranchPermissionRequired");
    expect(rejected.message).toBe("TF401027: You need the Git 'CreateBranch' permission.");
  });

  it("fails when the update response has no result", async () => {
    const fake = widgetsFake({ "refs/heads/main": "aaa111" });
    fake.beforeNext(
      (call) => call.resource === "refs" && call.method === "POST",
      () => ({ status: 200, body: { count: 0, value: [] } })
    );

    const error = await failWith(fake, publishBranch(PROJECT, REPO_ID, WORK, "aaa111"));

    expect(error).toBeInstanceOf(MalformedResponseError);
  });
});
