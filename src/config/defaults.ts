import { AppConfig } from './types.js';
import { DEFAULT_EXTENSIONS } from './constants.js';

export const defaultConfig: AppConfig = {
  scan: {
    directory: '',
    extensions: [...DEFAULT_EXTENSIONS],
    ffprobePath: 'ffprobe',
  },
  manifest: {
    outputPath: 'deovr',
    baseUrl: 'http://localhost',
  },
  filter: {
    minSizeMB: 10,
    minDurationSec: 60,
  },
  scheduler: {
    loopSeconds: 0,
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: '10m',
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
  verbose: false,
};
