/**
 * Names of the agent stages the audit pipeline invokes.
 *
 * @module
 */

export const AGENT_NAMES = ['scout', 'vision', 'graph', 'security', 'judge'] as const;

export type AgentName = (typeof AGENT_NAMES)[number];
