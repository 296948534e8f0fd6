// System prompt with a description of the tools the model may call

import type { ToolSchema } from '../tools/types.js';
import type { ToolSuggestion } from './tool-suggestions.js';

export const TOOL_ENABLED_PROMPT = `You are a helpful AI assistant with access to external tools. When you need to perform specific tasks that you have tools for, you MUST use the appropriate tools rather than trying to do the work manually.

IMPORTANT TOOL USAGE RULES:
1. Always use tools when they are available for the task at hand
2. Don't perform calculations manually if you have a calculator tool
3. Don't guess at information if you have tools to fetch it
4. Explain what tool you're using and why`;

function describeParameters(schema: ToolSchema): string {
  const lines = ['Parameters:'];
  for (const param of schema.parameters) {
    const required = param.required ? 'required' : 'optional';
    lines.push(`  - ${param.name} (${param.type}, ${required}): ${param.description}`);
  }

  if (schema.examples && schema.examples.length > 0) {
    lines.push('Examples:');
    for (const example of schema.examples) {
      lines.push(`  - ${example.description}`);
    }
  }

  return lines.join('\n');
}

/**
 * Appends the tool section to `basePrompt`. With no tools the base prompt is
 * returned unchanged; an empty base gets the tool-enabled default.
 */
export function buildSystemPrompt(
  basePrompt: string,
  tools: readonly ToolSchema[],
  suggestions: readonly ToolSuggestion[] = []
): string {
  if (tools.length === 0) {
    return basePrompt;
  }

  const sections = [basePrompt || TOOL_ENABLED_PROMPT, ''];
  sections.push('=== AVAILABLE TOOLS ===');
  sections.push('You have access to the following tools. Use them whenever appropriate:', '');

  for (const schema of tools) {
    sections.push(`**${schema.name}**: ${schema.description}`);
    sections.push(schema.usage ?? describeParameters(schema), '');
  }

  if (suggestions.length > 0) {
    sections.push('=== SUGGESTED TOOLS FOR THIS REQUEST ===');
    for (const suggestion of suggestions) {
      sections.push(`- ${suggestion.tool}: ${suggestion.reason}`);
    }
    sections.push('');
  }

  sections.push('=== TOOL USAGE REMINDER ===');
  sections.push('- ALWAYS use tools when they match the task requirements');
  sections.push("- Don't perform manual work that tools can do");
  sections.push('- Use multiple tools if needed to complete complex tasks');

  return sections.join('\n');
}
