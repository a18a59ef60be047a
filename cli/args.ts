export const USAGE = `Usage: npm run notes -- --bundle <file> [options]

Generate a clinical note for each encounter in a FHIR Bundle.

Options:
  -b, --bundle <file>   FHIR Bundle JSON file (required)
  -o, --out <dir>       Output directory (default: NOTES_OUTPUT_DIR or ./output)
  --documented-only     Only encounters referenced by a DocumentReference
  --dry-run             Write the prompts without calling the model
  --model <id>          Use this model for every note
  -h, --help            Show this message`;

export interface CliArgs {
  bundle: string;
  out?: string;
  documentedOnly: boolean;
  dryRun: boolean;
  model?: string;
  help: boolean;
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: Omit<CliArgs, 'bundle'> & { bundle?: string } = {
    documentedOnly: false,
    dryRun: false,
    help: false,
  };

  const takeValue = (flag: string, i: number): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-b':
      case '--bundle':
        args.bundle = takeValue(arg, i);
        i++;
        break;
      case '-o':
      case '--out':
        args.out = takeValue(arg, i);
        i++;
        break;
      case '--model':
        args.model = takeValue(arg, i);
        i++;
        break;
      case '--documented-only':
        args.documentedOnly = true;
        break;
      case '--dry-run':
        args.dryRun = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (args.help) return { ...args, bundle: args.bundle ?? '' };
  if (!args.bundle) throw new Error('--bundle is required');
  return { ...args, bundle: args.bundle };
}
