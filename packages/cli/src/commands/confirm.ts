import inquirer from 'inquirer';

export async function confirmAction(message: string, autoConfirm: boolean): Promise<boolean> {
  if (autoConfirm) return true;

  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message,
      default: false,
    },
  ]);

  return confirm;
}
