/** Configuration types — layered config system. */
export type TimeoutsConfig = {
  fetch_ms?: number;
  parse_ms?: number;
};

export type EnvpinConfig = {
  schema_version: string;
  cache_dir: string;
  store_root: string;
  concurrency?: number;
  timeouts?: TimeoutsConfig;
};
