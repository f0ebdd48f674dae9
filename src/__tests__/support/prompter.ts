import type { Prompter } from '../../core/prompter.js';

export interface ScriptedPrompter extends Prompter {
  readonly asked: string[];
}

/**
 * Prompter that answers from fixed scripts and records every question.
 */
export const scriptedPrompter = ({
  interactive = true,
  confirms = [],
  inputs = [],
}: {
  interactive?: boolean;
  confirms?: boolean[];
  inputs?: string[];
} = {}): ScriptedPrompter => {
  const asked: string[] = [];
  const confirmQueue = [...confirms];
  const inputQueue = [...inputs];

  return {
    interactive,
    asked,
    confirm: async (message) => {
      asked.push(message);
      return confirmQueue.shift() ?? false;
    },
    input: async (message) => {
      asked.push(message);
      return inputQueue.shift() ?? '';
    },
  };
};
