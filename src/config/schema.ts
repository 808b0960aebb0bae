import { z } from "zod";

export const CONFIG_FILE = ".manifesto.json";

export const policyLimitsSchema = z.object({
  maxTasks: z.number().int().positive().default(8),
  maxDescriptionWords: z.number().int().positive().default(12),
  maxDescriptionLength: z.number().int().positive().default(120),
});

export const manifestoConfigSchema = z
  .object({
    manifestDir: z.string().min(1).default("docs/_MANIFESTO"),
    testRunner: z.enum(["swift", "node", "shell", "none"]).default("swift"),
    /** Shell runner command. `{selector}` is replaced by the quoted test selector. */
    testCommand: z.string().min(1).optional(),
    commandTimeoutMs: z.number().int().positive().default(30_000),
    testTimeoutMs: z.number().int().positive().default(60_000),
    limits: policyLimitsSchema.default({}),
  })
  .refine((config) => config.testRunner !== "shell" || config.testCommand !== undefined, {
    message: 'testRunner "shell" requires testCommand',
    path: ["testCommand"],
  });
