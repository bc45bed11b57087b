import { parseCommandLine, USAGE, VERSION } from "../config";
import { ConfigError } from "../errors";
import { runCorpusCount, type Logger } from "./runCorpusCount";

export type CliIo = {
  print: (text: string) => void; // help and version
  logger: Logger;
};

// stdout may be the token sink, so progress goes to stderr
const processIo: CliIo = {
  print: (text) => process.stdout.write(text),
  logger: {
    log: (...args: unknown[]) => console.error(...args),
    warn: (...args: unknown[]) => console.warn(...args),
  },
};

/** Runs the command line and resolves to the process exit status. */
export async function main(argv: string[], io: CliIo = processIo): Promise<number> {
  try {
    const command = parseCommandLine(argv);
    if (command.kind === "help") {
      io.print(USAGE);
      return 0;
    }
    if (command.kind === "version") {
      io.print(`${VERSION}\n`);
      return 0;
    }
    await runCorpusCount(command.config, { logger: io.logger });
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      io.logger.warn(err.message);
      io.logger.warn("Try --help for usage.");
      return 2;
    }
    io.logger.warn(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
