/**
 * Tool fallback for targets without tool calling
 *
 * Tools are removed from the request and described in the system prompt so
 * the model still knows what exists.
 */

import type { GenericRequest, Tool } from '../types/generic'
import { isRecord } from '../util/json'
import type { ToolConversionContext } from './context'

export const TOOL_DESCRIPTIONS_HEADER = 'Available tools (for reference only, cannot be called directly):'

/**
 * One line per tool: `- name: description (parameters: a, b)`
 */
export function describeTools(tools: Tool[]): string {
  return tools
    .map((tool) => {
      let line = `- ${tool.name}`
      if (tool.description) line += `: ${tool.description}`

      const properties = tool.inputSchema.properties
      if (isRecord(properties)) {
        const params = Object.keys(properties)
        if (params.length > 0) line += ` (parameters: ${params.join(', ')})`
      }
      return line
    })
    .join('\n')
}

/**
 * Strip tools and tool choice, appending their descriptions to the system
 * prompt. Requests without tools come back unchanged.
 */
export function applyToolFallback(request: GenericRequest, context: ToolConversionContext): GenericRequest {
  const tools = request.tools ?? []
  if (tools.length === 0) return request

  const { tools: _tools, toolChoice: _toolChoice, ...rest } = request
  const descriptions = `${TOOL_DESCRIPTIONS_HEADER}\n${describeTools(tools)}`

  context.logger.warn(
    { toolCount: tools.length, provider: context.providerName },
    "Provider doesn't support tools, converting to text descriptions"
  )

  return {
    ...rest,
    system: request.system ? `${request.system}\n\n${descriptions}` : descriptions,
  }
}
