import inquirer from "inquirer";

export interface ConfirmOptions {
  /** Skip the prompt and approve. */
  yes?: boolean;
  defaultValue?: boolean;
}

/**
 * Asks a yes/no question on the terminal. Without a TTY nothing can be asked,
 * so the answer is no.
 */
export async function confirm(message: string, options: ConfirmOptions = {}): Promise<boolean> {
  if (options.yes) {
    return true;
  }

  if (!process.stdin.isTTY) {
    return false;
  }

  const response = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: "confirm",
      name: "confirmed",
      message,
      default: options.defaultValue ?? false,
    },
  ]);

  return response.confirmed;
}
