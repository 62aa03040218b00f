export interface CliOptions {
  input: string;
  output?: string;
  inPlace: boolean;
  onlyAnalyzeFirst: boolean;
  analyzeOnly: boolean;
  jobs: number;
}

export type CliInvocation = { kind: 'help' } | { kind: 'run'; options: CliOptions };

export const USAGE = `Usage: pixel-unscale [options] <input> [output]

Detects nearest-neighbor upscaled pixel art and writes it at its native resolution.

Arguments:
  input                     file to resize
  output                    where to write the output [default: "{basename}.scaled.{ext}"]

Options:
  -i, --in-place            overwrite the original file
                            ignored if an explicit output is given
  -f, --only-analyze-first  only analyze the first frame of an animation
                            much faster, but a blank first frame collapses the image to 1x1
  -a, --analyze             print the native size as WIDTHxHEIGHT without writing anything
  -j, --jobs <n>            worker threads used for detection [default: 1]
  -h, --help                print this help`;

export class CliUsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseArgs(argv: readonly string[]): CliInvocation {
  const positionals: string[] = [];
  let inPlace = false;
  let onlyAnalyzeFirst = false;
  let analyzeOnly = false;
  let jobs = 1;
  let onlyPositionals = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';

    if (onlyPositionals || !arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    switch (arg) {
      case '--':
        onlyPositionals = true;
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-i':
      case '--in-place':
        inPlace = true;
        break;
      case '-f':
      case '--only-analyze-first':
        onlyAnalyzeFirst = true;
        break;
      case '-a':
      case '--analyze':
        analyzeOnly = true;
        break;
      case '-j':
      case '--jobs': {
        jobs = parseJobs(argv[i + 1]);
        i += 1;
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  const [input, output, ...extra] = positionals;
  if (input === undefined) {
    throw new CliUsageError('Missing required argument: <input>');
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra.join(' ')}`);
  }

  return {
    kind: 'run',
    options: { input, output, inPlace, onlyAnalyzeFirst, analyzeOnly, jobs },
  };
}

function parseJobs(value: string | undefined): number {
  const jobs = value === undefined ? Number.NaN : Number(value);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new CliUsageError(`--jobs expects a positive integer, got ${value ?? 'nothing'}`);
  }
  return jobs;
}
