/** Scalar configuration values keyed by UPPER_CASE names. */
export type ConfigValue = string | number | boolean;

export type AppConfig = Record<string, ConfigValue>;

export type LoadConfigOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  fileName?: string;
};
