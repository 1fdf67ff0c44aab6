import type { ConfigFlags } from '../../lib/config.js';

/**
 * Unknown flag or a flag missing its value
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

export interface ParsedArgs {
  flags: ConfigFlags;
  /** Files and directories to publish */
  paths: string[];
  gitRepo?: string;
  xml: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

const VALUE_FLAGS = {
  api_url: 'apiUrl',
  username: 'username',
  password: 'password',
  space: 'space',
  ancestor_id: 'ancestorId',
  global_label: 'globalLabel',
} as const satisfies Record<string, keyof ConfigFlags>;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(name: string): name is ValueFlag {
  return Object.hasOwn(VALUE_FLAGS, name);
}

/**
 * Parse argv (without the node and script entries).
 * Flags take their value as the next argument or after '='; --api-url and
 * --api_url are the same flag. Everything after '--' is a path.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    flags: {},
    paths: [],
    xml: false,
    verbose: false,
    help: false,
    version: false,
  };
  const headers: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      parsed.paths.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '-h') {
      parsed.help = true;
      continue;
    }
    if (arg === '-v') {
      parsed.version = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      parsed.paths.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = (eq === -1 ? arg.slice(2) : arg.slice(2, eq)).replace(/-/g, '_');
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ArgumentError(`Missing value for --${name}`);
      }
      i++;
      return next;
    };

    if (isValueFlag(name)) {
      parsed.flags[VALUE_FLAGS[name]] = takeValue();
      continue;
    }

    switch (name) {
      case 'header':
        headers.push(takeValue());
        break;
      case 'git':
        parsed.gitRepo = takeValue();
        break;
      case 'dry_run':
        parsed.flags.dryRun = true;
        break;
      case 'xml':
        parsed.xml = true;
        break;
      case 'verbose':
        parsed.verbose = true;
        break;
      case 'help':
        parsed.help = true;
        break;
      case 'version':
        parsed.version = true;
        break;
      default:
        throw new ArgumentError(`Unknown option: ${arg}`);
    }
  }

  if (headers.length > 0) {
    parsed.flags.headers = headers;
  }
  return parsed;
}
