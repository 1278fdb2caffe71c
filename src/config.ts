import { join } from 'path';

export interface AppConfig {
  openaiApiKey?: string;
  openaiModel: string;
  outputDir: string;
  port: number;
}

function envVar(env: NodeJS.ProcessEnv, name: string) {
  return env[name] || '';
}

// Reads settings from the environment. dotenv is loaded by the entry point.
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<AppConfig> = {}): AppConfig {
  const port = Number(envVar(env, 'PORT'));
  return {
    openaiApiKey: envVar(env, 'OPENAI_API_KEY') || undefined,
    openaiModel: envVar(env, 'OPENAI_MODEL') || 'gpt-4o-mini',
    outputDir: envVar(env, 'OUTPUT_DIR') || join(process.cwd(), 'outputs'),
    port: Number.isInteger(port) && port > 0 ? port : 3000,
    ...overrides
  };
}
