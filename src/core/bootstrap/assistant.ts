import { z } from 'zod';
import { UserNotFoundError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { DEFAULT_ASSISTANT, DEFAULT_TOOLS, type FunctionDefinition } from './default-tools.js';
import type { ApiClient } from './api-client.js';
import type { ProvisionedAssistant } from '../../types/index.js';

export const STAGE_SETUP_ASSISTANT = 'setup-assistant';

const userSchema = z.object({ id: z.string() });

const toolSchema = z.object({
  id: z.string(),
  name: z.string().nullable().optional(),
  function: z.object({ name: z.string().optional() }).nullable().optional(),
});

const assistantSchema = z.object({
  id: z.string(),
  name: z.string(),
  tools: z.array(toolSchema).nullable().optional(),
});

const assistantListSchema = z.union([
  z.array(assistantSchema),
  z.object({ data: z.array(assistantSchema) }),
]);

type AssistantRecord = z.infer<typeof assistantSchema>;
type ToolRecord = z.infer<typeof toolSchema>;

const toolName = (tool: ToolRecord): string | null => tool.function?.name ?? tool.name ?? null;

/**
 * Make sure `userId` owns an assistant with the default name and tool set.
 * An existing assistant is reused and only the tools it lacks are created.
 */
export const provisionDefaultAssistant = async ({
  client,
  userId,
  assistant = DEFAULT_ASSISTANT,
  tools = DEFAULT_TOOLS,
  logger = silentLogger,
}: {
  client: ApiClient;
  userId: string;
  assistant?: { name: string; description: string; model: string; instructions: string };
  tools?: readonly FunctionDefinition[];
  logger?: Logger;
}): Promise<ProvisionedAssistant> => {
  const encodedUser = encodeURIComponent(userId);

  await client.request({
    stage: STAGE_SETUP_ASSISTANT,
    method: 'GET',
    path: `/v1/users/${encodedUser}`,
    schema: userSchema,
    onStatus: { 404: () => new UserNotFoundError(userId) },
  });

  const listed = await client.request({
    stage: STAGE_SETUP_ASSISTANT,
    method: 'GET',
    path: `/v1/users/${encodedUser}/assistants`,
    schema: assistantListSchema,
  });
  const existing = (Array.isArray(listed) ? listed : listed.data).find(
    (candidate) => candidate.name === assistant.name
  );

  let target: AssistantRecord;
  if (existing) {
    logger.debug(`Reusing assistant ${existing.id} (${existing.name}).`);
    target = existing;
  } else {
    target = await client.request({
      stage: STAGE_SETUP_ASSISTANT,
      method: 'POST',
      path: '/v1/assistants',
      schema: assistantSchema,
      body: { ...assistant, user_id: userId },
    });
    logger.debug(`Created assistant ${target.id}.`);
  }

  const attached = new Map(
    (target.tools ?? [])
      .map((tool): [string | null, string] => [toolName(tool), tool.id])
      .filter((entry): entry is [string, string] => entry[0] !== null)
  );

  const toolIds: string[] = [];
  for (const definition of tools) {
    const attachedId = attached.get(definition.name);
    if (attachedId !== undefined) {
      toolIds.push(attachedId);
      continue;
    }

    const tool = await client.request({
      stage: STAGE_SETUP_ASSISTANT,
      method: 'POST',
      path: '/v1/tools',
      schema: toolSchema,
      body: { name: definition.name, type: 'function', function: definition },
    });
    await client.request({
      stage: STAGE_SETUP_ASSISTANT,
      method: 'POST',
      path: `/v1/assistants/${encodeURIComponent(target.id)}/tools/${encodeURIComponent(tool.id)}`,
      schema: z.unknown(),
    });
    logger.debug(`Associated tool ${definition.name} (${tool.id}).`);
    toolIds.push(tool.id);
  }

  return {
    assistantId: target.id,
    assistantName: target.name,
    userId,
    reused: existing !== undefined,
    toolIds,
  };
};
