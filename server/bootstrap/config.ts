import Ajv from "ajv";
import schema from "../../config/schema.json";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface AppConfig {
  managementUser: string;
  managementPassword: string;
  managementPort: number;
  requestTimeoutMs: number;
  maxRedirects: number;
  logLevel: LogLevel;
  logPretty: boolean;
}

const ajv = new Ajv({ allErrors: true, useDefaults: true });
const validate = ajv.compile<AppConfig>(schema);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cfg = {
    managementUser: env.RABBITMQ_MGMT_USER || "guest",
    managementPassword: env.RABBITMQ_MGMT_PASSWORD ?? "guest",
    managementPort: parseInt(env.RABBITMQ_MGMT_PORT || "15672", 10),
    requestTimeoutMs: parseInt(env.RABBITMQ_MGMT_TIMEOUT_MS || "10000", 10),
    maxRedirects: parseInt(env.RABBITMQ_MGMT_MAX_REDIRECTS || "5", 10),
    logLevel: env.LOG_LEVEL || "info",
    logPretty: env.LOG_PRETTY === "true"
  };

  if (!validate(cfg)) {
    const msgs = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`).join("; ");
    throw new Error(`Invalid configuration: ${msgs}`);
  }
  return cfg;
}
