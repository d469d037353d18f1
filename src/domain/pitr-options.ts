import { z } from "zod";
import type { RecoveryTargetFlags } from "./recovery-target.js";

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const pitrOptionsSchema = z.object({
  default: z.boolean().optional(),
  immediate: z.boolean().optional(),
  time: optionalText,
  name: optionalText,
  lsn: optionalText,
  xid: optionalText,
  set: optionalText,
  skipPatroni: z.boolean().optional(),
  noRestart: z.boolean().optional(),
  plan: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  yes: z.boolean().optional(),
  stanza: optionalText,
  configPath: optionalText,
  repo: optionalText,
  dbsu: optionalText,
  dataDir: optionalText,
  exclusive: z.boolean().optional(),
  promote: z.boolean().optional(),
});

export interface PitrOptions extends RecoveryTargetFlags {
  /** Backup set label; combines with any recovery target. */
  readonly set?: string;
  readonly skipPatroni?: boolean;
  readonly noRestart?: boolean;
  readonly plan?: boolean;
  readonly dryRun?: boolean;
  readonly yes?: boolean;
  readonly stanza?: string;
  readonly configPath?: string;
  readonly repo?: string;
  readonly dbsu?: string;
  readonly dataDir?: string;
  readonly exclusive?: boolean;
  readonly promote?: boolean;
}

export function isPlanMode(options: PitrOptions): boolean {
  return Boolean(options.plan || options.dryRun);
}
