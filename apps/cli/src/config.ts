import { z } from "zod";

export type MassTarget = {
  value: string;
  unit: string;
};

export type CliConfig = {
  /** Pack mass used when neither the command line nor the record names one. */
  fallbackTarget: MassTarget;
  decimals: number;
};

const envSchema = z.object({
  FORMULATOR_TARGET_MASS: z.string().trim().min(1).default("1"),
  FORMULATOR_TARGET_UNIT: z.string().trim().min(1).default("kg"),
  FORMULATOR_DECIMALS: z.coerce.number().int().min(0).max(20).default(2)
});

export function loadConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment: ${issues.join("; ")}`);
  }
  return {
    fallbackTarget: { value: parsed.data.FORMULATOR_TARGET_MASS, unit: parsed.data.FORMULATOR_TARGET_UNIT },
    decimals: parsed.data.FORMULATOR_DECIMALS
  };
}
