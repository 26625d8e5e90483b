/**
 * Argument parsing for the screenshot CLI.
 */

export interface CliArgs {
  help: boolean;
  urlsPath: string | null;
}

export function parseArgs(args: string[]): CliArgs {
  const help = args.includes('--help') || args.includes('-h');

  for (const flag of ['-u', '--urls']) {
    const index = args.indexOf(flag);
    if (index !== -1 && index + 1 < args.length) {
      return { help, urlsPath: args[index + 1] };
    }
  }

  const inline = args.find(arg => arg.startsWith('--urls='));
  return { help, urlsPath: inline ? inline.slice('--urls='.length) : null };
}
