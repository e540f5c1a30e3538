export interface AppSettings {
  port: number;
  /** Resolved against the working directory. */
  questionsFile: string;
  sessionTtlMinutes: number;
  shuffleOptions: boolean;
  botToken?: string;
}

type Env = Record<string, string | undefined>;

function positiveInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw) || Number(raw) < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

function flag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`${name} must be true or false, got "${raw}"`);
}

export function loadSettings(env: Env): AppSettings {
  return {
    port: positiveInteger(env, 'PORT', 3000),
    questionsFile: env.QUESTIONS_FILE?.trim() || 'data/questions.json',
    sessionTtlMinutes: positiveInteger(env, 'SESSION_TTL_MINUTES', 120),
    shuffleOptions: flag(env, 'SHUFFLE_OPTIONS', true),
    botToken: env.BOT_TOKEN?.trim() || undefined,
  };
}

export default () => ({ app: loadSettings(process.env) });
