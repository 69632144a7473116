/**
 * Typed tool definitions for the tool-calling loop in BaseAgent
 */

import type OpenAI from 'openai';
import type { z } from 'zod';

export interface ToolContext {
  sessionId: string;
}

export interface ToolDefinition<TArgs> {
  name: string;
  description: string;
  /** JSON schema sent to the model */
  parameters: Record<string, unknown>;
  /** Validates the arguments the model produced */
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  execute(args: TArgs, context: ToolContext): Promise<string>;
}

export interface AgentTool {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  invoke(rawArguments: string, context: ToolContext): Promise<string>;
}

export function defineTool<TArgs>(definition: ToolDefinition<TArgs>): AgentTool {
  const { name, description, parameters, schema } = definition;

  return {
    name,
    description,
    parameters,
    async invoke(rawArguments: string, context: ToolContext): Promise<string> {
      let parsed: unknown;
      try {
        parsed = rawArguments.trim() ? JSON.parse(rawArguments) : {};
      } catch {
        return `Error: invalid JSON arguments for ${name}`;
      }

      const result = schema.safeParse(parsed);
      if (!result.success) {
        const issues = result.error.issues
          .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
          .join('; ');
        return `Error: invalid arguments for ${name}: ${issues}`;
      }

      return definition.execute(result.data, context);
    },
  };
}

export function toOpenAITool(tool: AgentTool): OpenAI.Chat.ChatCompletionTool {
  return {
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}

export const NO_PARAMETERS: Record<string, unknown> = {
  type: 'object',
  properties: {},
};
