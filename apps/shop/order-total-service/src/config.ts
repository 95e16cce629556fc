/**
 * Runtime config for the order total service. Built once at startup and
 * passed into createApp; nothing else reads the environment.
 * SALES_TAX_RATE_SERVICE is the only variable it looks at.
 */
export type Config = {
  host: string;
  port: number;
  rateServiceUrl: string;
  rateServiceTimeoutMs: number;
};

export const DEFAULT_RATE_SERVICE_URL = "http://localhost:8001/find_rate";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    host: "0.0.0.0",
    port: 8002,
    rateServiceUrl: env.SALES_TAX_RATE_SERVICE || DEFAULT_RATE_SERVICE_URL,
    rateServiceTimeoutMs: 5_000,
  };
}
