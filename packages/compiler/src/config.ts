export type Environment = Readonly<Record<string, string | undefined>>;

export type PatternLoweringOptions = {
  /** Throw `PatternLoweringBug` on violated invariants instead of reporting LW9999. */
  strictInvariants: boolean;
};

export const STRICT_INVARIANTS_ENV = "PATLOWER_STRICT_INVARIANTS";

export const readProcessEnv = (): Environment => {
  const processValue = (globalThis as {
    process?: { env?: Record<string, string | undefined> };
  }).process;
  return processValue?.env ?? {};
};

/** `true`/`false` for recognized flag spellings, `undefined` otherwise. */
export const parseFlag = (raw: string | undefined): boolean | undefined => {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return undefined;
};

export const resolveLoweringOptions = (
  overrides: Partial<PatternLoweringOptions> = {},
  env: Environment = readProcessEnv()
): PatternLoweringOptions => ({
  strictInvariants:
    overrides.strictInvariants ??
    parseFlag(env[STRICT_INVARIANTS_ENV]) ??
    env.NODE_ENV !== "production",
});
