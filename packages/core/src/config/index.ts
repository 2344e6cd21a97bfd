export {
  loadConfig,
  ConfigError,
  TransportSchema,
  DEFAULT_API_BASE_URL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SERVER_PORT,
  type VaultConfig,
  type TransportKind,
} from "./env";
