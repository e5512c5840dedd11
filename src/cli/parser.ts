export interface CliArgs {
  namespace?: string | undefined;
  context?: string | undefined;
  model?: string | undefined;
  intervalSeconds?: number | undefined;
  once: boolean;
}

function parseInterval(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    namespace: undefined,
    context: undefined,
    model: undefined,
    intervalSeconds: undefined,
    once: false
  };

  const positionalArgs: string[] = [];
  let i = 0;

  while (i < args.length) {
    const arg = args[i];

    // Handle --context or -c
    if (arg === '--context' || arg === '-c') {
      result.context = args[i + 1];
      i += 2;
      continue;
    }

    // Handle --context=value
    if (arg?.startsWith('--context=')) {
      result.context = arg.split('=')[1];
      i++;
      continue;
    }

    // Handle --model or -m
    if (arg === '--model' || arg === '-m') {
      result.model = args[i + 1];
      i += 2;
      continue;
    }

    // Handle --model=value
    if (arg?.startsWith('--model=')) {
      result.model = arg.split('=')[1];
      i++;
      continue;
    }

    // Handle --interval or -i (seconds)
    if (arg === '--interval' || arg === '-i') {
      result.intervalSeconds = parseInterval(args[i + 1]);
      i += 2;
      continue;
    }

    if (arg?.startsWith('--interval=')) {
      result.intervalSeconds = parseInterval(arg.split('=')[1]);
      i++;
      continue;
    }

    if (arg === '--once') {
      result.once = true;
      i++;
      continue;
    }

    // Collect positional arguments
    if (arg && !arg.startsWith('-')) {
      positionalArgs.push(arg);
    }

    i++;
  }

  // First positional argument is the namespace to watch; none means all
  if (positionalArgs.length > 0) {
    result.namespace = positionalArgs[0];
  }

  return result;
}
