/**
 * Tool profiles: which extraction strategy and renderer each supported
 * command gets. Everything tool-specific lives here as data; the engine
 * has no per-tool code.
 *
 * `commands` entries are matched word by word against the invoked command:
 * leading words must match exactly, words from the first `-flag` on must
 * appear together somewhere in the arguments.
 */

import type { PatternTemplate, PhaseRule, ToolProfile } from "../engine/types.js";

export const PLAIN_PROFILE_NAME = "plain";

// =============================================================================
// Version control
// =============================================================================

const GIT_HINT: PhaseRule = { pattern: /^\s+\(use "git / };

const gitStatus: ToolProfile = {
  name: "git-status",
  description: "git status (long or short format) as one line per changed path",
  commands: ["git status"],
  tags: ["git", "vcs"],
  renderer: "entities",
  strategy: {
    kind: "phased",
    table: {
      initial: "header",
      global: [
        { pattern: /^On branch (?<branch>\S+)/, emit: { kind: "summary", fields: { message: "on branch {branch}" } } },
        { pattern: /^## (?<branch>[^.\s]+)/, emit: { kind: "summary", fields: { message: "on branch {branch}" } } },
        { pattern: /^HEAD detached at (?<ref>\S+)/, emit: { kind: "summary", fields: { message: "detached at {ref}" } } },
        {
          pattern: /^Your branch is (?<relation>ahead of|behind) '(?<upstream>[^']+)' by (?<count>\d+) commits?/,
          emit: { kind: "summary", fields: { message: "{relation} {upstream} by {count}" } },
        },
        {
          pattern: /^nothing to commit/,
          emit: { kind: "summary", fields: { message: "nothing to commit" } },
        },
        { prefix: "Changes to be committed:", next: "staged" },
        { prefix: "Changes not staged for commit:", next: "unstaged" },
        { prefix: "Untracked files:", next: "untracked" },
        { prefix: "Unmerged paths:", next: "conflicts" },
      ],
      states: {
        header: {
          rules: [
            {
              pattern: /^\s?(?<code>[MADRCU?!]{1,2})\s+(?<file>\S.*)$/,
              emit: { kind: "info", fields: { code: "{code}", message: "{file}" } },
            },
          ],
        },
        staged: {
          rules: [
            GIT_HINT,
            {
              pattern: /^\s+(?<status>modified|new file|deleted|renamed|copied|typechange):\s+(?<file>.+)$/,
              emit: { kind: "info", fields: { code: "staged {status}", message: "{file}" } },
            },
          ],
        },
        unstaged: {
          rules: [
            GIT_HINT,
            {
              pattern: /^\s+(?<status>modified|deleted|typechange):\s+(?<file>.+)$/,
              emit: { kind: "info", fields: { code: "{status}", message: "{file}" } },
            },
          ],
        },
        untracked: {
          rules: [
            GIT_HINT,
            {
              pattern: /^\s+(?<file>\S.*)$/,
              emit: { kind: "info", fields: { code: "untracked", message: "{file}" } },
            },
          ],
        },
        conflicts: {
          rules: [
            GIT_HINT,
            {
              pattern: /^\s+(?<status>both modified|both added|both deleted|added by us|added by them|deleted by us|deleted by them):\s+(?<file>.+)$/,
              emit: { kind: "error", fields: { code: "conflict", message: "{file} ({status})" } },
            },
          ],
        },
      },
    },
  },
};

const gitLog: ToolProfile = {
  name: "git-log",
  description: "git log as one line per commit (short hash and subject)",
  commands: ["git log"],
  tags: ["git", "vcs"],
  renderer: "entities",
  strategy: {
    kind: "phased",
    table: {
      initial: "start",
      global: [{ pattern: /^commit (?<short>[0-9a-f]{7})[0-9a-f]*\b/, capture: true, next: "header" }],
      states: {
        start: {
          rules: [
            {
              pattern: /^(?<sha>[0-9a-f]{7,12}) (?<subject>.+)$/,
              emit: { kind: "info", fields: { code: "{sha}", message: "{subject}" } },
            },
          ],
        },
        header: {
          rules: [
            { pattern: /^(?:Author|AuthorDate|Commit|CommitDate|Date|Merge):/ },
            {
              pattern: /^\s{4}(?<subject>\S.*)$/,
              emit: { kind: "info", fields: { code: "{short}", message: "{subject}" } },
              next: "body",
            },
          ],
        },
        body: { rules: [] },
      },
    },
  },
};

const HUNK_HEADER = /^(?<hunk>@@ -(?<old>\d+)(?:,\d+)? \+(?<new>\d+)(?:,\d+)? @@.*)$/;

const gitDiff: ToolProfile = {
  name: "git-diff",
  description: "git diff reduced to hunk headers and changed lines with their line numbers",
  commands: ["git diff", "git show"],
  tags: ["git", "vcs"],
  renderer: "diff",
  strategy: {
    kind: "phased",
    table: {
      initial: "start",
      global: [{ pattern: /^diff --git a\/\S+ b\/(?<file>\S+)$/, capture: true, next: "header" }],
      states: {
        start: { rules: [] },
        header: {
          rules: [
            {
              pattern: HUNK_HEADER,
              capture: true,
              emit: { kind: "info", fields: { file: "{file}", code: "@@", message: "{hunk}" } },
              next: "hunk",
            },
            {
              pattern: /^Binary files .* differ$/,
              emit: { kind: "info", fields: { file: "{file}", message: "binary file changed" } },
            },
          ],
        },
        hunk: {
          // "+" lines are numbered in the new file, "-" lines in the old one
          matchBlank: true,
          rules: [
            {
              pattern: HUNK_HEADER,
              capture: true,
              emit: { kind: "info", fields: { file: "{file}", code: "@@", message: "{hunk}" } },
            },
            { pattern: /^\\ No newline at end of file$/ },
            {
              pattern: /^\+$/,
              emit: { kind: "info", fields: { file: "{file}", line: "{new}", code: "+", message: "(blank)" } },
              advance: ["new"],
            },
            {
              pattern: /^\+(?<text>.*)$/,
              emit: { kind: "info", fields: { file: "{file}", line: "{new}", code: "+", message: "{text}" } },
              advance: ["new"],
            },
            {
              pattern: /^-$/,
              emit: { kind: "info", fields: { file: "{file}", line: "{old}", code: "-", message: "(blank)" } },
              advance: ["old"],
            },
            {
              pattern: /^-(?<text>.*)$/,
              emit: { kind: "info", fields: { file: "{file}", line: "{old}", code: "-", message: "{text}" } },
              advance: ["old"],
            },
            { pattern: /^(?: |$)/, advance: ["old", "new"] },
          ],
        },
      },
    },
  },
};

const gitWrite: ToolProfile = {
  name: "git-write",
  description: "git add, commit, push and pull reduced to what changed and what was rejected",
  commands: ["git add", "git commit", "git push", "git pull", "git fetch"],
  tags: ["git", "vcs"],
  renderer: "entities",
  strategy: {
    kind: "pattern",
    templates: [
      { kind: "error", regex: /^(?:fatal|error): (?<message>.+)$/ },
      { kind: "error", regex: /^CONFLICT \([^)]+\): (?<message>.+)$/, fields: { code: "conflict", message: "{message}" } },
      {
        kind: "error",
        regex: /^\s*! \[(?<code>[^\]]+)\]\s+(?<ref>\S+ -> \S+) \((?<reason>[^)]+)\)$/,
        fields: { code: "{code}", message: "{ref}: {reason}" },
      },
      { kind: "error", regex: /^\s*! \[(?<code>[^\]]+)\]\s+(?<message>\S+ -> \S+)$/ },
      { kind: "warning", regex: /^warning: (?<message>.+)$/ },
      { kind: "info", regex: /^\[(?<branch>[^\s\]]+)(?: \(root-commit\))? (?<code>[0-9a-f]{7,})\] (?<message>.+)$/ },
      {
        kind: "info",
        regex: /^\s+\*\s+\[new (?<what>branch|tag)\]\s+(?<ref>\S+ -> \S+)$/,
        fields: { code: "new {what}", message: "{ref}" },
      },
      { kind: "info", regex: /^\s+\+?\s*(?<code>[0-9a-f]{7,}\.{2,3}[0-9a-f]{7,})\s+(?<message>\S+ -> \S+)/ },
      { kind: "info", regex: /^\s(?<file>\S.*?)\s+\|\s+(?<stat>\d+ [+-]*|Bin .+)$/, fields: { message: "{file} {stat}" } },
      { kind: "info", regex: /^\s(?<op>create|delete) mode \d+ (?<file>.+)$/, fields: { code: "{op}d", message: "{file}" } },
      { kind: "summary", regex: /^\s*(?<message>\d+ files? changed.*)$/ },
      { kind: "summary", regex: /^Updating (?<range>[0-9a-f]+\.\.[0-9a-f]+)$/, fields: { message: "updated {range}" } },
      {
        kind: "summary",
        regex: /^(?<message>Everything up-to-date|Already up to date\.?|nothing to commit.*|no changes added to commit.*)$/,
      },
    ],
  },
};

// =============================================================================
// Test runners
// =============================================================================

const cargoTest: ToolProfile = {
  name: "cargo-test",
  description: "cargo test: failing tests with their panic message, then the result line",
  commands: ["cargo test"],
  tags: ["rust", "test"],
  strategy: {
    kind: "phased",
    table: {
      initial: "build",
      global: [
        {
          pattern: /^---- (?<name>\S+) stdout ----$/,
          emit: { kind: "error", fields: { message: "{name}" } },
          next: "failure",
        },
        {
          pattern: /^test result: \w+\. (?<passed>\d+) passed; (?<failed>\d+) failed/,
          emit: { kind: "summary", fields: { message: "{passed} passed, {failed} failed" } },
          next: "done",
        },
        { prefix: "failures:", next: "listing" },
        { pattern: /^running \d+ tests?$/, next: "running" },
      ],
      states: {
        build: { rules: [] },
        running: { rules: [] },
        failure: {
          attachContext: true,
          contextFilter: /^(?!note: )/,
          rules: [
            {
              pattern: /^thread '.*' panicked at '(?<reason>.*)', (?<file>[^:\s]+):(?<line>\d+):(?<column>\d+)$/,
              amend: { file: "{file}", line: "{line}", column: "{column}", message: "{reason}" },
            },
            {
              pattern: /^thread '.*' panicked at (?<file>[^:\s]+):(?<line>\d+):(?<column>\d+):$/,
              amend: { file: "{file}", line: "{line}", column: "{column}" },
            },
          ],
        },
        listing: { rules: [] },
        done: { rules: [] },
      },
    },
  },
};

const pytest: ToolProfile = {
  name: "pytest",
  description: "pytest: failure headers with their assertion lines, then the session summary",
  commands: ["pytest", "py.test"],
  tags: ["python", "test"],
  strategy: {
    kind: "phased",
    table: {
      initial: "session",
      global: [
        { pattern: /^=+ (?:FAILURES|ERRORS) =+$/, next: "failures" },
        { pattern: /^=+ short test summary info =+$/, next: "short" },
        { pattern: /^=+ warnings summary =+$/, next: "short" },
        {
          pattern: /^=+ (?<summary>.*\bin [\d.]+s\b.*?) =+$/,
          emit: { kind: "summary", fields: { message: "{summary}" } },
          next: "done",
        },
        {
          pattern: /^(?<summary>\d+ (?:passed|failed|errors?|skipped)\b.* in [\d.]+s\b.*)$/,
          emit: { kind: "summary", fields: { message: "{summary}" } },
          next: "done",
        },
      ],
      states: {
        session: { rules: [] },
        failures: {
          attachContext: true,
          contextFilter: /^E\s/,
          rules: [
            { pattern: /^_{3,} (?<name>.+?) _{3,}$/, emit: { kind: "error", fields: { message: "{name}" } } },
            {
              pattern: /^(?<file>[^\s:]+\.py):(?<line>\d+): (?<code>\w+)$/,
              amend: { file: "{file}", line: "{line}", code: "{code}" },
            },
          ],
        },
        short: { rules: [] },
        done: { rules: [] },
      },
    },
  },
};

const goTestJson: ToolProfile = {
  name: "go-test-json",
  description: "go test -json event stream: failed tests and a pass/fail count",
  commands: ["go test -json"],
  tags: ["go", "test"],
  source: "stdout",
  strategy: {
    kind: "streaming",
    layout: {
      typeField: "Action",
      events: {
        pass: [{ kind: "info", requires: ["Test"], fields: { code: "{Package}", message: "{Test}" } }],
        fail: [
          { kind: "error", requires: ["Test"], fields: { code: "{Package}", message: "{Test}" } },
          { kind: "error", requires: ["FailedBuild"], fields: { message: "build failed: {FailedBuild}" } },
        ],
      },
      summary: "{info} passed, {error} failed",
    },
    fallback: [{ kind: "error", regex: /^--- FAIL: (?<message>\S+)/ }],
  },
};

const jestJson: ToolProfile = {
  name: "jest-json",
  description: "jest/vitest JSON report: failing assertions with their messages",
  commands: ["jest --json", "vitest run --reporter=json", "vitest --reporter=json"],
  tags: ["javascript", "test"],
  renderer: "test-failures",
  source: "stdout",
  strategy: {
    kind: "structured",
    layout: {
      entries: "testResults",
      children: "assertionResults",
      fields: { file: "name", message: "fullName", severity: "status", context: "failureMessages" },
      severities: { failed: "error", passed: "info", pending: "info", skipped: "info", todo: "info" },
      defaultKind: "info",
      summary: "{numPassedTests} passed, {numFailedTests} failed",
    },
  },
};

// =============================================================================
// Compilers and linters
// =============================================================================

const cargoBuild: ToolProfile = {
  name: "cargo-build",
  description: "cargo build/check/clippy diagnostics grouped by file",
  commands: ["cargo build", "cargo check", "cargo clippy"],
  tags: ["rust", "build", "lint"],
  renderer: "grouped",
  strategy: {
    kind: "phased",
    table: {
      initial: "main",
      global: [
        {
          pattern: /^error: (?<message>could not compile .+)$/,
          emit: { kind: "summary", fields: { message: "{message}" } },
        },
        {
          pattern: /^warning: (?<message>.+ generated \d+ warnings?.*)$/,
          emit: { kind: "summary", fields: { message: "{message}" } },
        },
        {
          pattern: /^error(?:\[(?<code>[^\]]+)\])?: (?<message>.+)$/,
          emit: { kind: "error", fields: { code: "{code}", message: "{message}" } },
        },
        {
          pattern: /^warning(?:\[(?<code>[^\]]+)\])?: (?<message>.+)$/,
          emit: { kind: "warning", fields: { code: "{code}", message: "{message}" } },
        },
        {
          pattern: /^\s*--> (?<file>[^:]+):(?<line>\d+):(?<column>\d+)$/,
          amend: { file: "{file}", line: "{line}", column: "{column}" },
        },
      ],
      states: { main: { rules: [] } },
    },
  },
};

const tsc: ToolProfile = {
  name: "tsc",
  description: "TypeScript compiler diagnostics grouped by file",
  commands: ["tsc", "vue-tsc"],
  tags: ["typescript", "build"],
  strategy: {
    kind: "pattern",
    templates: [
      {
        kind: "error",
        regex: /^(?<file>.+?)\((?<line>\d+),(?<column>\d+)\): error (?<code>TS\d+): (?<message>.+)$/,
      },
      {
        kind: "error",
        regex: /^(?<file>\S+?):(?<line>\d+):(?<column>\d+) - error (?<code>TS\d+): (?<message>.+)$/,
      },
      { kind: "summary", regex: /^(?<message>Found \d+ errors?\b.*)$/ },
    ],
  },
};

const ruff: ToolProfile = {
  name: "ruff",
  description: "ruff check violations grouped by file",
  commands: ["ruff check", "ruff"],
  tags: ["python", "lint"],
  strategy: {
    kind: "pattern",
    templates: [
      {
        kind: "error",
        regex: /^(?<file>[^\s:][^:]*):(?<line>\d+):(?<column>\d+): (?<code>[A-Z]+\d+) (?:\[\*\] )?(?<message>.+)$/,
      },
      { kind: "summary", regex: /^(?<message>Found \d+ errors?\b.*)$/ },
      { kind: "summary", regex: /^(?<message>All checks passed!)$/ },
    ],
  },
};

const MYPY_DIAGNOSTIC = (level: string) =>
  new RegExp(
    `^(?<file>[^\\s:][^:]*):(?<line>\\d+):(?:(?<column>\\d+):)? ${level}: (?<message>.+?)(?:\\s+\\[(?<code>[\\w-]+)\\])?$`,
  );

const mypy: ToolProfile = {
  name: "mypy",
  description: "mypy type errors grouped by file",
  commands: ["mypy", "dmypy run"],
  tags: ["python", "lint"],
  strategy: {
    kind: "pattern",
    templates: [
      { kind: "error", regex: MYPY_DIAGNOSTIC("error") },
      { kind: "warning", regex: MYPY_DIAGNOSTIC("warning") },
      { kind: "summary", regex: /^(?<message>(?:Found \d+ errors?|Success:).*)$/ },
    ],
    skip: [/^[^\s:][^:]*:\d+:(?:\d+:)? note: /],
  },
};

const goBuild: ToolProfile = {
  name: "go-build",
  description: "go build / go vet diagnostics grouped by file",
  commands: ["go build", "go vet"],
  tags: ["go", "build", "lint"],
  strategy: {
    kind: "pattern",
    templates: [
      {
        kind: "error",
        regex: /^(?:vet: )?(?<file>[^\s:#][^:]*\.go):(?<line>\d+):(?:(?<column>\d+):)? (?<message>.+)$/,
      },
    ],
    skip: [/^# /],
  },
};

const ESLINT_UNIX: PatternTemplate[] = [
  {
    kind: "error",
    regex: /^(?<file>[^:]+):(?<line>\d+):(?<column>\d+): (?<message>.+?) \[Error\/(?<code>[^\]]+)\]$/,
  },
  {
    kind: "warning",
    regex: /^(?<file>[^:]+):(?<line>\d+):(?<column>\d+): (?<message>.+?) \[Warning\/(?<code>[^\]]+)\]$/,
  },
];

const eslintJson: ToolProfile = {
  name: "eslint-json",
  description: "ESLint JSON report grouped by file and rule",
  commands: ["eslint --format json", "eslint --format=json", "eslint -f json"],
  tags: ["javascript", "typescript", "lint"],
  source: "stdout",
  strategy: {
    kind: "structured",
    layout: {
      entries: "",
      children: "messages",
      fields: {
        file: "filePath",
        line: "line",
        column: "column",
        code: "ruleId",
        message: "message",
        severity: "severity",
      },
      severities: { "1": "warning", "2": "error" },
      defaultKind: "warning",
    },
    fallback: ESLINT_UNIX,
  },
};

// =============================================================================
// Cluster and container state
// =============================================================================

const POD_ROW = "^(?:(?<namespace>\\S+)\\s+)?(?<name>\\S+)\\s+(?<ready>\\d+/\\d+)\\s+(?<status>STATUS)\\s+(?<restarts>\\d+)(?: \\([^)]*\\))?\\s+(?<age>\\S+)$";
const POD_FIELDS = { code: "{status}", message: "{name} ready {ready}, restarts {restarts}" };

const kubectlPods: ToolProfile = {
  name: "kubectl-pods",
  description: "kubectl get pods as one line per pod, unhealthy pods flagged",
  commands: ["kubectl get pods", "kubectl get pod", "kubectl get po"],
  tags: ["kubernetes"],
  renderer: "entities",
  strategy: {
    kind: "pattern",
    templates: [
      { kind: "info", regex: new RegExp(POD_ROW.replace("STATUS", "Running|Completed|Succeeded")), fields: POD_FIELDS },
      { kind: "warning", regex: new RegExp(POD_ROW.replace("STATUS", "\\S+")), fields: POD_FIELDS },
      { kind: "summary", regex: /^(?<message>No resources found.*)$/ },
    ],
    skip: [/^(?:NAMESPACE\s+)?NAME\s+READY\s+STATUS/],
  },
};

const SVC_ROW =
  "^(?:(?<namespace>\\S+)\\s+)?(?<name>\\S+)\\s+(?<type>ClusterIP|NodePort|LoadBalancer|ExternalName)\\s+(?<cluster>\\S+)\\s+(?<external>EXTERNAL)\\s+(?<ports>\\S+)\\s+(?<age>\\S+)$";

const kubectlServices: ToolProfile = {
  name: "kubectl-services",
  description: "kubectl get services as one line per service with its ports",
  commands: ["kubectl get services", "kubectl get service", "kubectl get svc"],
  tags: ["kubernetes"],
  renderer: "entities",
  strategy: {
    kind: "pattern",
    templates: [
      { kind: "info", regex: new RegExp(SVC_ROW.replace("EXTERNAL", "<none>")), fields: { code: "{type}", message: "{name} {ports}" } },
      {
        kind: "warning",
        regex: new RegExp(SVC_ROW.replace("EXTERNAL", "<pending>")),
        fields: { code: "{type}", message: "{name} {ports} external IP pending" },
      },
      { kind: "info", regex: new RegExp(SVC_ROW.replace("EXTERNAL", "\\S+")), fields: { code: "{type}", message: "{name} {ports} via {external}" } },
      { kind: "summary", regex: /^(?<message>No resources found.*)$/ },
    ],
    skip: [/^(?:NAMESPACE\s+)?NAME\s+TYPE\s+CLUSTER-IP/],
  },
};

// Columns are separated by two or more spaces; PORTS may be empty
const CONTAINER_ROW =
  '^(?<id>[0-9a-f]{12})\\s{2,}(?<image>\\S+)\\s{2,}".*?"\\s{2,}(?<created>\\S.*?)\\s{2,}(?<status>STATUS)\\s{2,}(?:(?<ports>\\S.*?)\\s{2,})?(?<names>\\S+)$';
const CONTAINER_FIELDS = { code: "{status}", message: "{names} ({image})" };

const dockerPs: ToolProfile = {
  name: "docker-ps",
  description: "docker ps as one line per container (status, name, image), first 20",
  commands: ["docker ps", "docker container ls", "docker container ps"],
  tags: ["docker"],
  renderer: "entities",
  limit: 20,
  strategy: {
    kind: "pattern",
    templates: [
      { kind: "info", regex: new RegExp(CONTAINER_ROW.replace("STATUS", "Up(?:(?!\\(unhealthy\\)).)*?")), fields: CONTAINER_FIELDS },
      { kind: "warning", regex: new RegExp(CONTAINER_ROW.replace("STATUS", "\\S.*?")), fields: CONTAINER_FIELDS },
    ],
    skip: [/^CONTAINER ID\s+IMAGE/],
  },
};

const IMAGE_ROW = "^(?<repo>REPO)\\s+(?<tag>\\S+)\\s+(?<id>[0-9a-f]{12})\\s+(?<created>\\S.*?)\\s+(?<size>[\\d.]+\\s?[kKMGT]?B)$";

const dockerImages: ToolProfile = {
  name: "docker-images",
  description: "docker images as one line per image with its size, first 20",
  commands: ["docker images", "docker image ls", "docker image list"],
  tags: ["docker"],
  renderer: "entities",
  limit: 20,
  strategy: {
    kind: "pattern",
    templates: [
      {
        kind: "warning",
        regex: new RegExp(IMAGE_ROW.replace("REPO", "<none>")),
        fields: { message: "dangling {id} {size}" },
      },
      { kind: "info", regex: new RegExp(IMAGE_ROW.replace("REPO", "\\S+")), fields: { message: "{repo}:{tag} {size}" } },
    ],
    skip: [/^REPOSITORY\s+TAG/],
  },
};

// =============================================================================
// Filesystem
// =============================================================================

/** `ls -l` row up to the name; TYPE is the file type letter class */
const LS_ROW =
  "^TYPE[rwxsStTl-]{9}[.+@]?\\s+\\d+\\s+\\S+\\s+\\S+\\s+(?<size>\\S+)\\s+\\w{3}\\s+\\d{1,2}\\s+(?:\\d{1,2}:\\d{2}|\\d{4})\\s+";

const ls: ToolProfile = {
  name: "ls",
  description: "ls listings as one name per line, directories marked with a slash",
  commands: ["ls"],
  tags: ["filesystem"],
  renderer: "entities",
  strategy: {
    kind: "pattern",
    templates: [
      { kind: "error", regex: /^ls: (?<message>.+)$/ },
      { kind: "info", regex: new RegExp(`${LS_ROW.replace("TYPE", "d")}(?<name>.+)$`), fields: { message: "{name}/" } },
      {
        kind: "info",
        regex: new RegExp(`${LS_ROW.replace("TYPE", "l")}(?<name>.+?) -> (?<target>.+)$`),
        fields: { message: "{name} -> {target}" },
      },
      { kind: "info", regex: new RegExp(`${LS_ROW.replace("TYPE", "[-cbps]")}(?<name>.+)$`), fields: { message: "{name} ({size})" } },
      { kind: "info", regex: /^(?<name>\S.*)$/, fields: { message: "{name}" } },
    ],
    skip: [/^total \S+$/, /^d\S*\s.*\s\.\.?$/],
  },
};

const find: ToolProfile = {
  name: "find",
  description: "find results grouped by directory",
  commands: ["find"],
  tags: ["filesystem"],
  renderer: "paths",
  strategy: {
    kind: "pattern",
    templates: [
      { kind: "error", regex: /^find: (?<message>.+)$/ },
      { kind: "info", regex: /^(?<dir>.*)\/(?<name>[^/]+)\/?$/, fields: { file: "{dir}", message: "{name}" } },
      { kind: "info", regex: /^(?<name>[^/]+)$/, fields: { message: "{name}" } },
    ],
    skip: [/^\.$/],
  },
};

// =============================================================================
// Logs
// =============================================================================

const dockerLogs: ToolProfile = {
  name: "docker-logs",
  description: "container logs with repeated lines collapsed",
  commands: ["docker logs", "docker compose logs", "docker-compose logs"],
  tags: ["logs", "docker"],
  strategy: { kind: "plain" },
};

const kubectlLogs: ToolProfile = {
  name: "kubectl-logs",
  description: "pod logs with repeated lines collapsed",
  commands: ["kubectl logs"],
  tags: ["logs", "kubernetes"],
  strategy: { kind: "plain" },
};

const plain: ToolProfile = {
  name: PLAIN_PROFILE_NAME,
  description: "any other command: repeated lines collapsed with counts",
  commands: [],
  tags: ["logs"],
  strategy: { kind: "plain" },
};

export const TOOL_PROFILES: readonly ToolProfile[] = [
  gitStatus,
  gitLog,
  gitDiff,
  gitWrite,
  cargoTest,
  pytest,
  goTestJson,
  jestJson,
  cargoBuild,
  tsc,
  ruff,
  mypy,
  goBuild,
  eslintJson,
  kubectlPods,
  kubectlServices,
  dockerPs,
  dockerImages,
  ls,
  find,
  dockerLogs,
  kubectlLogs,
  plain,
];
