import dotenv from 'dotenv';
import fs from 'fs-extra';
import { AppConfig, LogLevel } from './types.js';
import { defaultConfig } from './defaults.js';
import { ENV_PREFIX } from './constants.js';
import { CliArguments } from '../cli/argumentParser.js';
import { appConfigSchema } from '../validation/configSchemas.js';
import { ConfigurationError, ErrorCode } from '../errors/index.js';
import { strToBool } from '../utils/strToBool.js';

type Environment = Record<string, string | undefined>;

/**
 * Build the base URL for video links from WEB_SSL / WEB_HOST / WEB_PORT,
 * unless DEOVR_JSON_GEN_URL names one outright.
 * The default port for the protocol is implied when WEB_PORT is unset.
 */
export function resolveBaseUrl(env: Environment): string {
  const url = env[`${ENV_PREFIX}URL`];
  if (url) {
    return url;
  }

  const protocol = strToBool(env.WEB_SSL) ? 'https' : 'http';
  const host = env.WEB_HOST || 'localhost';
  const port = env.WEB_PORT || '';
  return `${protocol}://${host}${port ? ':' : ''}${port}`;
}

/**
 * Resolves every setting from command-line arguments first, then the
 * environment, then defaults. One instance per process run; the resulting
 * AppConfig is passed explicitly to whatever needs it.
 */
export class ConfigManager {
  private readonly config: AppConfig;

  constructor(
    private readonly args: CliArguments,
    private readonly env: Environment = process.env
  ) {
    this.config = this.loadConfig();
  }

  /**
   * Load `.env` into process.env, then resolve against it
   */
  static fromProcess(args: CliArguments): ConfigManager {
    dotenv.config();
    return new ConfigManager(args, process.env);
  }

  private loadConfig(): AppConfig {
    const config = structuredClone(defaultConfig);
    const { args } = this;

    // Scan configuration
    config.scan.directory = (args.directory ?? this.getString(`${ENV_PREFIX}DIR`, '')).trim();

    const cliExtensions = args.extensions?.filter(ext => ext.length > 0) ?? [];
    const envExtensions = this.getStringArray(`${ENV_PREFIX}EXT`);
    if (cliExtensions.length > 0) {
      config.scan.extensions = cliExtensions;
    } else if (envExtensions.length > 0) {
      config.scan.extensions = envExtensions;
    }

    config.scan.ffprobePath = this.getString(`${ENV_PREFIX}FFPROBE`, config.scan.ffprobePath);

    // Manifest output
    config.manifest.outputPath = args.output ?? this.getString(`${ENV_PREFIX}OUTPUT`, config.manifest.outputPath);
    config.manifest.baseUrl = (args.url ?? resolveBaseUrl(this.env)).replace(/\/+$/, '');

    // Filtering
    config.filter.minSizeMB =
      args.minSizeMB ?? this.getNumber(`${ENV_PREFIX}MIN_SIZE`, config.filter.minSizeMB);
    config.filter.minDurationSec =
      args.minDurationSec ?? this.getNumber(`${ENV_PREFIX}MIN_DURATION`, config.filter.minDurationSec);

    // Scheduling
    config.scheduler.loopSeconds =
      args.loopSeconds ?? this.getNumber(`${ENV_PREFIX}LOOP`, config.scheduler.loopSeconds);

    // Logging configuration
    config.verbose = args.verbose || this.getBoolean(`${ENV_PREFIX}VERBOSE`, config.verbose);
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    const value = this.env[key];
    return value ? value : defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (!value || value.trim() === '') {
      return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a whole number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    return strToBool(this.env[key]) ?? defaultValue;
  }

  private getStringArray(key: string): string[] {
    const value = this.env[key];
    if (!value) {
      return [];
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getEnum<T extends LogLevel>(key: string, defaultValue: T, validValues: T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${validValues.join(', ')}`);
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /**
   * Reject configurations that cannot produce a scene list.
   * Runs before the first scan; every failure is a ConfigurationError.
   */
  async validate(): Promise<void> {
    const { directory } = this.config.scan;
    if (!directory) {
      throw new ConfigurationError(
        'directory',
        'No path or directory were provided',
        undefined,
        ErrorCode.CONFIG_MISSING
      );
    }

    const result = appConfigSchema.safeParse(this.config);
    if (!result.success) {
      const errors = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(
        result.error.issues[0]?.path.join('.') ?? 'config',
        `Configuration validation failed:\n${errors.join('\n')}`,
        { metadata: { errors } }
      );
    }

    const isDirectory = await fs.stat(directory).then(
      stats => stats.isDirectory(),
      () => false
    );
    if (!isDirectory) {
      throw new ConfigurationError('directory', `${directory} is not a valid directory`);
    }

    const { outputPath } = this.config.manifest;
    const outputIsDirectory = await fs.stat(outputPath).then(
      stats => stats.isDirectory(),
      () => false
    );
    if (outputIsDirectory) {
      throw new ConfigurationError('output', `${outputPath} is a directory, expected a file path`);
    }
  }
}
