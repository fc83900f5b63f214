import { ConfigError } from './config.js';

export interface CliArgs {
  configPath?: string;
  mode?: string;
  blueprints: string[];
  help: boolean;
}

export const USAGE = `Usage: catalog-sync [options]

Mirrors catalog blueprints into BigQuery tables.

Options:
  --config <file>     Entities configuration file (overrides ENTITIES_CONFIG_JSON / ENTITIES_CONFIG)
  --mode <mode>       Migration mode: weak, balanced or hard (overrides AUTO_MIGRATE)
  --blueprint <id>    Only sync this blueprint; repeatable
  -h, --help          Show this help

Credentials and targets are read from the environment (and a .env file):
  PORT_CLIENT_ID, PORT_CLIENT_SECRET, BIGQUERY_PROJECT_ID, BIGQUERY_DATASET_ID, ...
`;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { blueprints: [], help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    // --flag=value
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);

    const value = (): string => {
      const next = inline ?? argv[++i];
      if (next === undefined || next === '' || (inline === undefined && next.startsWith('--'))) {
        throw new ConfigError(`Missing value for ${flag}`);
      }
      return next;
    };

    switch (flag) {
      case '--config':
        args.configPath = value();
        break;
      case '--mode':
        args.mode = value();
        break;
      case '--blueprint':
        args.blueprints.push(value());
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
