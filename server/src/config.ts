export type ServerConfig = {
  port: number;
  requestLog: boolean;
  jsonLimit: string;
};

export const DEFAULT_PORT = 8788;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT || DEFAULT_PORT);
  return {
    port: Number.isInteger(port) && port >= 0 && port < 65536 ? port : DEFAULT_PORT,
    requestLog: env.HEXAPAWN_REQUEST_LOG === "1",
    jsonLimit: env.HEXAPAWN_JSON_LIMIT || "16kb",
  };
}
