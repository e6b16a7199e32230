export interface AppConfig {
  port: number;
  databasePath: string;
  sourcePath: string;
  production: boolean;
}

/** Read runtime settings from the environment. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = parseInt(env.PORT || "3000", 10);
  return {
    port: Number.isNaN(port) ? 3000 : port,
    databasePath: env.DATABASE_PATH || "data.db",
    sourcePath: env.SOURCE_PATH || "data/F-A0010-001.json",
    production: env.NODE_ENV === "production",
  };
}
