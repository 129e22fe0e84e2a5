import inquirer from 'inquirer';

export interface ConfirmOptions {
  yes?: boolean;
  nonInteractive?: boolean;
}

/**
 * Prompts the user for confirmation. `--yes` approves without asking;
 * non-interactive mode, or a stdin that is not a TTY, declines.
 *
 * @param action The action being confirmed (e.g. "Delete repository acme/widgets")
 * @param details Optional details or warning message
 * @param defaultNo Whether the default choice should be 'No' (default: true)
 */
export async function confirm(
  action: string,
  details?: string,
  defaultNo: boolean = true,
  options: ConfirmOptions = {},
): Promise<boolean> {
  if (options.yes) {
    return true;
  }

  if (options.nonInteractive || !process.stdin.isTTY) {
    return false;
  }

  const response = await inquirer.prompt<{ confirmed: boolean }>([
    {
      type: 'confirm',
      name: 'confirmed',
      message: details ? `${action}\n${details}` : action,
      default: !defaultNo,
    },
  ]);
  return response.confirmed;
}
