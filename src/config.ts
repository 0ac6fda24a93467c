// Arktype schemas for the relay configuration.
//
// Configuration is an explicit value handed to TrackRelay and the server; the
// CLI is the only place that reads flags or the environment.

import { type } from "arktype";

export const CatalogConfig = type({
  url: "string.url",
  username: "string",
  password: "string",
});
export type CatalogConfig = typeof CatalogConfig.infer;

export const StoreConfig = type({
  url: "string.url",
});
export type StoreConfig = typeof StoreConfig.infer;

export const RelayConfig = type({
  catalog: CatalogConfig,
  store: StoreConfig,
});
export type RelayConfig = typeof RelayConfig.infer;

export const ServerConfig = type({
  port: "0 <= number.integer <= 65535",
  "host?": "string",
});
export type ServerConfig = typeof ServerConfig.infer;

export function parseRelayConfig(x: unknown): RelayConfig {
  const out = RelayConfig(x);
  if (out instanceof type.errors) throw new Error(`invalid relay config: ${out.summary}`);
  return out;
}

export function parseServerConfig(x: unknown): ServerConfig {
  const out = ServerConfig(x);
  if (out instanceof type.errors) throw new Error(`invalid server config: ${out.summary}`);
  return out;
}

// Strips trailing slashes so paths can be appended with a single "/".
export function baseUrl(url: string): string {
  return url.replace(/\/+$/, "");
}
