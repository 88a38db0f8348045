import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { APP_NAME } from '../constants.js';
import { ConfigError } from '../errors.js';
import { defaultConfig, manpageConfigSchema, type ManpageConfig } from '../schemas/config.schema.js';

export interface LoadedConfig {
  config: ManpageConfig;
  /** File the configuration came from; undefined when defaults were used */
  filepath?: string;
}

export const CONFIG_SEARCH_PLACES = [
  'package.json',
  `.${APP_NAME}rc`,
  `.${APP_NAME}rc.json`,
  `.${APP_NAME}rc.yaml`,
  `.${APP_NAME}rc.yml`,
  `${APP_NAME}.config.js`,
  `${APP_NAME}.config.cjs`,
];

export const parseConfig = (raw: unknown, source = 'configuration'): ManpageConfig => {
  const result = manpageConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${source}: ${details}`);
  }
  return result.data;
};

/**
 * Find and validate configuration, starting in `searchFrom` (the working
 * directory by default). Missing configuration yields the defaults.
 */
export const loadConfig = async (searchFrom: string = process.cwd()): Promise<LoadedConfig> => {
  const explorer = cosmiconfig(APP_NAME, {
    searchPlaces: CONFIG_SEARCH_PLACES,
  });

  let result: CosmiconfigResult;
  try {
    result = await explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      `Failed to read configuration: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!result || result.isEmpty) {
    return { config: defaultConfig, filepath: result?.filepath };
  }

  return { config: parseConfig(result.config, result.filepath), filepath: result.filepath };
};
