export type RecoveryTarget =
  | { readonly kind: "default" }
  | { readonly kind: "immediate" }
  | { readonly kind: "time"; readonly value: string }
  | { readonly kind: "name"; readonly value: string }
  | { readonly kind: "lsn"; readonly value: string }
  | { readonly kind: "xid"; readonly value: string };

export type RecoveryTargetKind = RecoveryTarget["kind"];

export interface RecoveryTargetFlags {
  readonly default?: boolean;
  readonly immediate?: boolean;
  readonly time?: string;
  readonly name?: string;
  readonly lsn?: string;
  readonly xid?: string;
}

export const TARGET_FLAG_HINT =
  "--default, --immediate, --time, --name, --lsn, --xid";

/** Every target the flags select, in flag order. */
export function selectedTargets(flags: RecoveryTargetFlags): RecoveryTarget[] {
  const targets: RecoveryTarget[] = [];
  if (flags.default) {
    targets.push({ kind: "default" });
  }
  if (flags.immediate) {
    targets.push({ kind: "immediate" });
  }
  if (flags.time) {
    targets.push({ kind: "time", value: flags.time });
  }
  if (flags.name) {
    targets.push({ kind: "name", value: flags.name });
  }
  if (flags.lsn) {
    targets.push({ kind: "lsn", value: flags.lsn });
  }
  if (flags.xid) {
    targets.push({ kind: "xid", value: flags.xid });
  }
  return targets;
}

export function describeTarget(target: RecoveryTarget | null): string {
  if (!target) {
    return "Unknown";
  }
  switch (target.kind) {
    case "default":
      return "Latest (end of WAL stream)";
    case "immediate":
      return "Backup consistency point";
    case "time":
      return `Time: ${target.value}`;
    case "name":
      return `Restore point: ${target.value}`;
    case "lsn":
      return `LSN: ${target.value}`;
    case "xid":
      return `XID: ${target.value}`;
  }
}
