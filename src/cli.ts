import { parseArgs } from "util";

export interface CliOptions {
  debug: boolean;
  once: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      debug: { type: "boolean", short: "d", default: false },
      once: { type: "boolean", default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    debug: values.debug ?? false,
    once: values.once ?? false,
  };
}

export const USAGE = "Usage: roster-watch [-d|--debug] [--once]";
