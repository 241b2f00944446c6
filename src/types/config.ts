import { clientConfigSchema } from "../config/config-schema.js";

/** Client timing configuration. Every field has a default. */
export interface ClientConfig {
  // Handshake
  connectTimeoutMs?: number; // default: 1000 per attempt
  connectRetryScheduleMs?: readonly number[]; // default: [500, 500, 1500, 5000]

  // Channels
  channelOpenTimeoutMs?: number; // default: 1000
  auxiliaryHelloTimeoutMs?: number; // default: 1000 (0 skips the wait)

  // Game DVR
  dvrRecordSeconds?: number; // default: 60
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<ClientConfig>;

export const DEFAULT_CONFIG: ResolvedConfig = {
  connectTimeoutMs: 1000,
  connectRetryScheduleMs: [500, 500, 1500, 5000],
  channelOpenTimeoutMs: 1000,
  auxiliaryHelloTimeoutMs: 1000,
  dvrRecordSeconds: 60,
};

export function resolveConfig(config: ClientConfig = {}): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = clientConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  const { data } = validation;
  return {
    connectTimeoutMs: data.connectTimeoutMs ?? DEFAULT_CONFIG.connectTimeoutMs,
    connectRetryScheduleMs: [
      ...(data.connectRetryScheduleMs ?? DEFAULT_CONFIG.connectRetryScheduleMs),
    ],
    channelOpenTimeoutMs: data.channelOpenTimeoutMs ?? DEFAULT_CONFIG.channelOpenTimeoutMs,
    auxiliaryHelloTimeoutMs: data.auxiliaryHelloTimeoutMs ?? DEFAULT_CONFIG.auxiliaryHelloTimeoutMs,
    dvrRecordSeconds: data.dvrRecordSeconds ?? DEFAULT_CONFIG.dvrRecordSeconds,
  };
}
