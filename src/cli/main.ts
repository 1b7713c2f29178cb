#!/usr/bin/env node
import { createProgram } from "./program";
import { toCliError } from "./errors";

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    const cliError = toCliError(error);

    if (program.opts().json) {
      console.log(JSON.stringify({ error: { code: cliError.code, message: cliError.message } }));
    } else {
      console.error(`Error: ${cliError.message}`);
    }

    return cliError.exitCode;
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}
