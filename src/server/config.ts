import { DEFAULT_TRIALS } from "../engine/constants";

export type Env = Readonly<Record<string, string | undefined>>;

export type AdvisorConfig = {
  wsPort: number;
  trials: number;
  compareLegs: number;
  maxTrials: number;

  /** undefined means Math.random. Numeric strings become number seeds. */
  seed: number | string | undefined;

  validateState: boolean;
};

export const DEFAULT_WS_PORT = 8790;
export const DEFAULT_COMPARE_LEGS = 200;
export const DEFAULT_MAX_TRIALS = 1_000_000;

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  if (s === "1" || s === "true" || s === "yes" || s === "on") return true;
  if (s === "0" || s === "false" || s === "no" || s === "off") return false;
  return defaultValue;
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

function envSeed(env: Env, name: string): number | string | undefined {
  const v = env[name];
  if (v == null || v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isInteger(n) ? n : v.trim();
}

export function loadAdvisorConfig(env: Env = process.env): AdvisorConfig {
  return {
    wsPort: envInt(env, "CAMELUP_WS_PORT", DEFAULT_WS_PORT),
    trials: envInt(env, "CAMELUP_TRIALS", DEFAULT_TRIALS),
    compareLegs: envInt(env, "CAMELUP_COMPARE_LEGS", DEFAULT_COMPARE_LEGS),
    maxTrials: envInt(env, "CAMELUP_MAX_TRIALS", DEFAULT_MAX_TRIALS),
    seed: envSeed(env, "CAMELUP_SEED"),
    validateState: envFlag(env, "CAMELUP_VALIDATE_STATE", true),
  };
}
