import inquirer from 'inquirer';

export class ConsoleUI {
  /** Asks for a goal until a non-blank one is entered. */
  async askGoal(): Promise<string> {
    const { goal } = await inquirer.prompt<{ goal: string }>([
      {
        type: 'input',
        name: 'goal',
        message: 'What goal should be planned?',
        validate: (value: string) => value.trim().length > 0 || 'Goal is required',
      },
    ]);
    return goal.trim();
  }
}
