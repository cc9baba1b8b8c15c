import type { Target } from '../core/types.js';

export function buildExtractionPrompt(target: Target): string {
  return [
    `Analyze repository: ${target.identifier}`,
    `Location: ${target.locator}`,
    `Description: ${target.description || 'No description'}`,
    '',
    'Does this repository likely require authentication cookies for external services?',
    'Consider: API integrations, data scraping, automated testing, etc.',
    '',
    'Respond with JSON:',
    '{',
    '  "action": "extract" or "skip",',
    '  "reason": "brief explanation"',
    '}',
  ].join('\n');
}
