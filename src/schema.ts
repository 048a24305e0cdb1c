import { z } from "zod";

function isKnownTimeZone(zone: string) {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

export const SyncConfigSchema = z.object({
  disabled: z.boolean(),
  credential: z.string().optional(),
  identity: z.object({
    name: z.string().optional(),
    email: z.string().optional(),
  }),
  defaultIdentity: z.object({
    name: z.string().min(1),
    email: z.string().min(1),
  }),
  lockTimeoutMs: z.number().int().nonnegative(),
  lockPollIntervalMs: z.number().int().positive(),
  staleIndexLockMs: z.number().int().nonnegative(),
  timeZone: z.string().refine(isKnownTimeZone, {
    message: "Unknown IANA time zone",
  }),
  commitMessageTemplate: z.string().includes("{timestamp}"),
  fallbackBranch: z.string().min(1),
  tokenUsername: z.string().min(1),
  transientNetworkPatterns: z.array(z.string().min(1)),
});
export type SyncConfig = z.infer<typeof SyncConfigSchema>;
