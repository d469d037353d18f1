export interface PlanAction {
  readonly step: number;
  readonly description: string;
}

export interface PlanResource {
  readonly type: string;
  readonly name: string;
  readonly impact?: string;
  readonly detail?: string;
}

export interface ExecutionPlan {
  readonly command: string;
  readonly actions: readonly PlanAction[];
  readonly affects: readonly PlanResource[];
  readonly expected: string;
  readonly risks: readonly string[];
}

export type PlanFormat = "text" | "json";

export function renderPlan(plan: ExecutionPlan, format: PlanFormat): string {
  return format === "json" ? renderPlanJson(plan) : renderPlanText(plan);
}

export function renderPlanJson(plan: ExecutionPlan): string {
  return JSON.stringify(plan, null, 2);
}

export function renderPlanText(plan: ExecutionPlan): string {
  const lines: string[] = ["Execution Plan"];

  if (plan.command) {
    lines.push(`Command: ${plan.command}`);
  }

  if (plan.actions.length > 0) {
    lines.push("", "Actions:");
    plan.actions.forEach((action, index) => {
      const step = action.step > 0 ? action.step : index + 1;
      lines.push(`  [${step}] ${action.description}`);
    });
  }

  if (plan.affects.length > 0) {
    lines.push("", "Affects:");
    lines.push(
      ...renderTable(
        ["Type", "Name", "Impact", "Detail"],
        plan.affects.map((resource) => [
          resource.type,
          resource.name,
          resource.impact ?? "",
          resource.detail ?? "",
        ]),
      ),
    );
  }

  if (plan.expected) {
    lines.push("", "Expected:", `  ${plan.expected}`);
  }

  if (plan.risks.length > 0) {
    lines.push("", "Risks:");
    for (const risk of plan.risks) {
      lines.push(`  - ${risk}`);
    }
  }

  return lines.join("\n");
}

function renderTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const format = (cells: readonly string[]): string =>
    `  ${cells
      .map((cell, column) => cell.padEnd(widths[column] ?? cell.length))
      .join("  ")
      .trimEnd()}`;

  return [
    format(headers),
    format(widths.map((width) => "-".repeat(width))),
    ...rows.map(format),
  ];
}
