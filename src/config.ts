export interface Config {
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    logLevel: env.LOG_LEVEL || 'info',
  };
}
