export interface CliOptions {
  seed: number;
  width: number;
  height: number;
  output: string;
}

/** Parse `--seed`, `--width`, `--height` and `--output`, falling back to `defaults`. */
export function parseArgs(argv: string[], defaults: CliOptions): CliOptions {
  const args = argv.slice(2);
  let { seed, width, height, output } = defaults;

  const nextInt = (i: number, flag: string) => {
    const raw = args[i];
    const value = Number(raw);
    if (raw === undefined || !Number.isInteger(value)) {
      throw new Error(`${flag} expects an integer (got ${raw ?? 'nothing'})`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--seed':
        seed = nextInt(++i, '--seed');
        break;
      case '--width':
        width = nextInt(++i, '--width');
        break;
      case '--height':
        height = nextInt(++i, '--height');
        break;
      case '--output': {
        const value = args[++i];
        if (value === undefined) throw new Error('--output expects a path');
        output = value;
        break;
      }
      default:
        throw new Error(`Unknown argument: ${args[i]}`);
    }
  }

  return { seed, width, height, output };
}
