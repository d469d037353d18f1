import { CLI_NAME, DEFAULT_CLUSTER_SERVICE } from "./pitr-plan.js";

export interface GuidanceInput {
  readonly noRestart: boolean;
  readonly promote: boolean;
  readonly clusterWasStopped: boolean;
  readonly clusterService?: string;
}

export interface GuidanceStep {
  readonly title: string;
  readonly lines: readonly string[];
}

export function buildGuidanceSteps(input: GuidanceInput): GuidanceStep[] {
  const service = input.clusterService ?? DEFAULT_CLUSTER_SERVICE;
  const steps: GuidanceStep[] = [];

  if (input.noRestart) {
    steps.push({ title: "Start PostgreSQL", lines: ["pg_ctl start -D <data dir>"] });
  }
  steps.push({ title: "Verify recovered data", lines: ["psql -d postgres"] });
  if (!input.promote) {
    steps.push({
      title: "If satisfied, promote to primary",
      lines: [`${CLI_NAME} promote`],
    });
  }
  if (input.clusterWasStopped) {
    steps.push({
      title: `To resume ${service} cluster management`,
      lines: [
        `WARNING: Ensure data is correct before starting ${service}!`,
        `systemctl start ${service}`,
        "",
        "Or if you want this node to be the leader:",
        `1. Promote PostgreSQL first: ${CLI_NAME} promote`,
        `2. Then start ${service}: systemctl start ${service}`,
      ],
    });
  }
  steps.push({
    title: "Re-create pgBackRest stanza if needed",
    lines: ["pgbackrest --stanza=<stanza> stanza-create"],
  });
  return steps;
}

const RULE = "=".repeat(66);

export function renderGuidance(input: GuidanceInput): string {
  const blocks = buildGuidanceSteps(input).map((step, index) =>
    [
      `[${index + 1}] ${step.title}:`,
      ...step.lines.map((line) => (line ? `   ${line}` : "")),
    ].join("\n"),
  );
  return `\n${RULE}\n PITR Complete\n${RULE}\n\n${blocks.join("\n\n")}\n\n${RULE}\n`;
}
