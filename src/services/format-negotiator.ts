export interface NegotiationInput {
  format?: string | undefined;
  accept?: string | undefined;
  userAgent?: string | undefined;
}

/** A rule returns a format when it applies, or undefined to pass. */
export type NegotiationRule = (input: NegotiationInput) => string | undefined;

/** Lowercase User-Agent fragments of known crawlers and LLM agents. */
export const AUTOMATION_USER_AGENTS: readonly string[] = [
  'gptbot',
  'chatgpt',
  'claude',
  'googlebot',
  'bingbot',
  'anthropic',
  'perplexity',
  'claudebot',
  'github-copilot',
];

const ACCEPT_MAPPINGS: readonly (readonly [readonly string[], string])[] = [
  [['application/json'], 'json'],
  [['text/markdown', 'text/x-markdown'], 'md'],
  [['text/plain'], 'text'],
  [['text/html'], 'html'],
];

export const DEFAULT_FORMAT = 'html';

// Unrecognized values pass through; the render dispatcher rejects them.
export const explicitFormatRule: NegotiationRule = ({ format }) =>
  format ? format : undefined;

export const acceptHeaderRule: NegotiationRule = ({ accept }) => {
  if (!accept) return undefined;
  const normalized = accept.toLowerCase();
  for (const [mediaTypes, format] of ACCEPT_MAPPINGS) {
    if (mediaTypes.some((mediaType) => normalized.includes(mediaType))) {
      return format;
    }
  }
  return undefined;
};

export function isAutomationUserAgent(userAgent: string | undefined): boolean {
  if (!userAgent) return false;
  const normalized = userAgent.toLowerCase();
  return AUTOMATION_USER_AGENTS.some((fragment) =>
    normalized.includes(fragment)
  );
}

export const automationRule: NegotiationRule = ({ userAgent }) =>
  isAutomationUserAgent(userAgent) ? 'md' : undefined;

export const NEGOTIATION_RULES: readonly NegotiationRule[] = [
  explicitFormatRule,
  acceptHeaderRule,
  automationRule,
];

/**
 * Picks the requested format: explicit `format` parameter, then `Accept`,
 * then crawler detection, then html. Always returns a value.
 */
export function selectFormat(
  input: NegotiationInput,
  rules: readonly NegotiationRule[] = NEGOTIATION_RULES
): string {
  for (const rule of rules) {
    const format = rule(input);
    if (format !== undefined) return format;
  }
  return DEFAULT_FORMAT;
}
