/**
 * Phrases that mark a signal as higher risk, so it is sized with the reduced fraction
 */
export const REDUCED_RISK_KEYWORDS: readonly string[] = [
  'high risk',
  'risky',
  'small size',
  'small lot',
  'smaller lot',
  'low lot',
  'light lot',
  'half risk',
  'half lot',
  'reduced risk',
  'reduce risk',
  'conservative entry',
  'risk entry',
  'speculative',
  'use caution',
  'trade with caution',
];

export function detectReducedRisk(message: string): boolean {
  const text = message.toLowerCase().replace(/\s+/g, ' ');
  return REDUCED_RISK_KEYWORDS.some(keyword => text.includes(keyword));
}
