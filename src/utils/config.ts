/**
 * Runtime configuration read from the environment.
 */

export interface AppConfig {
  port: number;
  projectionDebug: boolean; // log the sale breakdown of every projection
}

const DEFAULT_PORT = 3000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number(env.PORT);
  return {
    port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    projectionDebug: env.PROJECTION_DEBUG === "1" || env.PROJECTION_DEBUG === "true",
  };
}
