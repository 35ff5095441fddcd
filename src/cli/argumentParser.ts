import { ConfigurationError } from '../errors/index.js';

/**
 * Values given on the command line. Anything left undefined falls back to
 * the environment, then to defaults (see ConfigManager).
 */
export interface CliArguments {
  directory?: string;
  extensions?: string[];
  output?: string;
  url?: string;
  minSizeMB?: number;
  minDurationSec?: number;
  loopSeconds?: number;
  verbose: boolean;
  help: boolean;
}

const USAGE = `Usage: deovr-scene-list [dir] [options]

Scan a directory of VR videos and write a DeoVR scene list.

Arguments:
  dir                      Path to directory with VR videos

Options:
  -e, --ext <ext...>       VR video file extensions
  -o, --output <path>      Where to write the scene list
  -u, --url <url>          Base URL used to build video links
      --min-size <MB>      Skip files smaller than this (0 disables)
      --min-duration <s>   Skip files shorter than this (0 disables)
  -l, --loop [s]           Generate every X seconds
  -v, --verbose            Verbose output
  -h, --help               Show this help`;

export function formatUsage(): string {
  return USAGE;
}

function parseInteger(flag: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new ConfigurationError(flag, `Missing value for ${flag}`);
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ConfigurationError(flag, `Invalid ${flag} value: ${raw}`);
  }
  return value;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined || raw.startsWith('-')) {
    throw new ConfigurationError(flag, `Missing value for ${flag}`);
  }
  return raw;
}

/**
 * Split `--name=value` into its flag and inline value
 */
function splitInlineValue(raw: string): { flag: string; inline?: string } {
  const eq = raw.indexOf('=');
  if (!raw.startsWith('--') || eq === -1) {
    return { flag: raw };
  }
  return { flag: raw.slice(0, eq), inline: raw.slice(eq + 1) };
}

export function parseArguments(argv: string[]): CliArguments {
  const args: CliArguments = { verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const { flag: arg, inline } = splitInlineValue(argv[i]);
    // Value of a single-valued option, inline or as the next argument
    const takeValue = (): string | undefined => inline ?? argv[++i];

    switch (arg) {
      case '--ext':
      case '-e': {
        const extensions: string[] = [];
        if (inline !== undefined) {
          extensions.push(inline);
        } else {
          // Takes every following value up to the next flag
          while (i + 1 < argv.length && !argv[i + 1].startsWith('-')) {
            extensions.push(argv[++i]);
          }
        }
        args.extensions = [...(args.extensions ?? []), ...extensions];
        break;
      }
      case '--output':
      case '-o': {
        args.output = requireValue(arg, takeValue());
        break;
      }
      case '--url':
      case '-u': {
        args.url = requireValue(arg, takeValue());
        break;
      }
      case '--min-size': {
        args.minSizeMB = parseInteger(arg, takeValue());
        break;
      }
      case '--min-duration': {
        args.minDurationSec = parseInteger(arg, takeValue());
        break;
      }
      case '--loop':
      case '-l': {
        // The value is optional; a bare flag leaves the interval to the environment
        if (inline === undefined && (i + 1 >= argv.length || argv[i + 1].startsWith('-'))) {
          break;
        }
        args.loopSeconds = parseInteger(arg, takeValue());
        break;
      }
      case '--verbose':
      case '-v': {
        args.verbose = true;
        break;
      }
      case '--help':
      case '-h': {
        args.help = true;
        break;
      }
      default: {
        if (arg.startsWith('-')) {
          throw new ConfigurationError(arg, `Unknown option: ${arg}`);
        }
        if (args.directory !== undefined) {
          throw new ConfigurationError('dir', `Unexpected argument: ${arg}`);
        }
        args.directory = arg;
      }
    }
  }

  return args;
}
