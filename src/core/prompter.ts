import inquirer from 'inquirer';
import { ConfirmationDeclinedError } from './errors.js';

export interface Prompter {
  readonly interactive: boolean;
  confirm: (message: string) => Promise<boolean>;
  input: (message: string) => Promise<string>;
}

export const createInquirerPrompter = ({
  interactive = Boolean(process.stdin.isTTY),
}: { interactive?: boolean } = {}): Prompter => ({
  interactive,
  confirm: async (message) => {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      { type: 'confirm', name: 'confirmed', message, default: false },
    ]);
    return confirmed;
  },
  input: async (message) => {
    const { answer } = await inquirer.prompt<{ answer: string }>([
      { type: 'input', name: 'answer', message },
    ]);
    return answer;
  },
});

/**
 * Yes/no confirmation. Without a terminal there is nobody to ask, so the
 * action is refused.
 */
export const requireConfirmation = async ({
  prompter,
  action,
  message,
}: {
  prompter: Prompter;
  action: string;
  message: string;
}): Promise<void> => {
  if (!prompter.interactive) {
    throw new ConfirmationDeclinedError(action, 'confirmation needs an interactive terminal');
  }
  if (!(await prompter.confirm(message))) {
    throw new ConfirmationDeclinedError(action);
  }
};

/**
 * Typed acknowledgement: the operator must enter `phrase` exactly.
 */
export const requireTypedAcknowledgement = async ({
  prompter,
  action,
  phrase,
}: {
  prompter: Prompter;
  action: string;
  phrase: string;
}): Promise<void> => {
  if (!prompter.interactive) {
    throw new ConfirmationDeclinedError(action, 'confirmation needs an interactive terminal');
  }
  const answer = await prompter.input(`Type '${phrase}' to proceed:`);
  if (answer.trim() !== phrase) {
    throw new ConfirmationDeclinedError(action);
  }
};
