import "dotenv/config";
import { readFile } from "node:fs/promises";
import { Cause, Effect } from "effect";
import {
  AzureDevOpsConfigFromEnv,
  createAzureRepos,
  describeError,
} from "../src/index.js";

// Usage: tsx examples/publish-file.ts <local-file> [repo-path]
// Connection settings come from AZDO_ORG_URL / AZDO_PAT (or a .env file);
// the target from AZDO_PROJECT, AZDO_REPO, AZDO_BASE_BRANCH, AZDO_WORK_BRANCH.
const [localFile, repoPath] = process.argv.slice(2);
const PROJECT = process.env.AZDO_PROJECT;
const REPO = process.env.AZDO_REPO;
const BASE_BRANCH = process.env.AZDO_BASE_BRANCH ?? "main";
const WORK_BRANCH = process.env.AZDO_WORK_BRANCH ?? "automation/update-file";

if (!localFile || !PROJECT || !REPO) {
  console.error("Usage: tsx examples/publish-file.ts <local-file> [repo-path]");
  console.error("\nCreate a .env file with:");
  console.error("  AZDO_ORG_URL=https://dev.azure.com/my-org");
  console.error("  AZDO_PAT=<personal access token>");
  console.error("  AZDO_PROJECT=project");
  console.error("  AZDO_REPO=repo");
  process.exit(1);
}

const targetPath = repoPath ?? `/${localFile}`;

const program = Effect.gen(function* () {
  const config = yield* AzureDevOpsConfigFromEnv.pipe(
    Effect.tapError((error) =>
      Effect.sync(() => console.error(`Invalid configuration: ${String(error)}`))
    )
  );
  const repos = createAzureRepos(config);

  const newContent = yield* Effect.tryPromise({
    try: () => readFile(localFile, "utf8"),
    catch: (e) =>
      new Error(`Cannot read ${localFile}: ${e instanceof Error ? e.message : String(e)}`),
  }).pipe(Effect.tapError((error) => Effect.sync(() => console.error(error.message))));

  console.log(`\n=== publishing ${targetPath} to ${PROJECT}/${REPO} ===\n`);

  const result = yield* repos
    .publishFileChangeAsPullRequest({
      project: PROJECT,
      repository: REPO,
      filePath: targetPath,
      newContent,
      pullRequestTitle: `Update ${targetPath}`,
      baseBranch: BASE_BRANCH,
      workingBranch: WORK_BRANCH,
    })
    .pipe(
      Effect.tapError((error) =>
        Effect.sync(() => {
          console.error(describeError(error));
          if (error.progress.pushId !== undefined) {
            console.error(`  push ${error.progress.pushId} was already applied`);
          }
        })
      )
    );

  console.log(`  branch ${result.sourceRef} (${result.branchAction})`);
  console.log(`  commit ${result.commitId.slice(0, 7)} in push ${result.pushId}`);
  console.log(`  pull request #${result.pullRequestId}: ${result.webUrl ?? result.url}`);

  return result;
});

// expected failures are reported where they occur
const main = program.pipe(
  Effect.tapDefect((cause) => Effect.sync(() => console.error(Cause.pretty(cause))))
);

Effect.runPromise(main).catch(() => {
  process.exit(1);
});
