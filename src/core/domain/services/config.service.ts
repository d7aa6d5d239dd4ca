import type { Config } from "../entities/config.entity.js";

export interface IConfigService {
  getConfig(): Config;
  getTransportConfig(): Config["transport"];
  getRetryConfig(): Config["retry"];
  getBreakerConfig(): Config["breaker"];
  getTransferConfig(): Config["transfer"];
  getStateConfig(): Config["state"];
  getArtifactConfig(): Config["artifact"];
  getLoggingConfig(): Config["logging"];
}
