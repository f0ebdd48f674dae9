export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required: string[];
  };
}

export const DEFAULT_ASSISTANT = {
  name: 'Q',
  description: 'Default general-purpose assistant',
  model: 'llama3.1',
  instructions:
    'You are Q, a general-purpose assistant. Use the available tools when they ' +
    'help answer the request, and say so when you cannot complete a task.',
} as const;

export const DEFAULT_TOOLS: readonly FunctionDefinition[] = [
  {
    name: 'code_interpreter',
    description: 'Execute code in a sandbox and return its output.',
    parameters: {
      type: 'object',
      properties: {
        code: { type: 'string', description: 'Source code to run.' },
      },
      required: ['code'],
    },
  },
  {
    name: 'web_search',
    description: 'Search the web and return the most relevant results.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query.' },
      },
      required: ['query'],
    },
  },
  {
    name: 'computer',
    description: 'Run a shell command on the sandbox computer.',
    parameters: {
      type: 'object',
      properties: {
        commands: { type: 'string', description: 'Commands to execute, one per line.' },
      },
      required: ['commands'],
    },
  },
  {
    name: 'vector_store_search',
    description: 'Search the assistant vector stores for relevant passages.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Text to search for.' },
        top_k: { type: 'integer', description: 'Number of passages to return.' },
      },
      required: ['query'],
    },
  },
];
