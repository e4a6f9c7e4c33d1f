import { TextRule, matchRule } from './ruleTable';

export type ManagementIntent = 'breakeven' | 'close' | 'partial_close';

export const CLOSE_RULES: ReadonlyArray<TextRule<'close'>> = [
  {
    id: 'close_positions',
    intent: 'close',
    pattern: /\bclose\s+(?:all\s+|every\s+|the\s+|your\s+|this\s+|these\s+|my\s+)*(?:positions?|trades?|orders?)\b/i,
  },
  {
    id: 'close_now',
    intent: 'close',
    pattern: /\bclose\s+(?:it\s+|them\s+)?(?:all|now|early|immediately|at\s+market)\b/i,
  },
  {
    id: 'exit_positions',
    intent: 'close',
    pattern: /\bexit\s+(?:all\s+|the\s+|your\s+)*(?:positions?|trades?|now)\b/i,
  },
  { id: 'get_out', intent: 'close', pattern: /\bget\s+out\b/i },
  { id: 'take_profit_now', intent: 'close', pattern: /\btake\s+(?:some\s+)?profits?\s+now\b/i },
  {
    id: 'cancel_orders',
    intent: 'close',
    pattern: /\bcancel\s+(?:all\s+|the\s+|this\s+|pending\s+)*(?:orders?|trades?|signal|entries|entry)\b/i,
  },
  { id: 'bare_close', intent: 'close', pattern: /^\s*close\b/i },
  { id: 'bare_cancel', intent: 'close', pattern: /^\s*cancel\b/i },
];

export const BREAKEVEN_RULES: ReadonlyArray<TextRule<'breakeven'>> = [
  { id: 'breakeven_word', intent: 'breakeven', pattern: /\bbreak[\s\-_.]*even\b/i },
  {
    id: 'move_sl_to_entry',
    intent: 'breakeven',
    pattern: /\bmove\s+(?:the\s+|your\s+)?(?:sl|stop\s*loss|stops?)\s+to\s+(?:entry|be|cost)\b/i,
  },
  {
    id: 'sl_to_entry',
    intent: 'breakeven',
    pattern: /\b(?:sl|stop\s*loss)\s+(?:to|at)\s+(?:entry|be)\b/i,
  },
  {
    id: 'lock_profits',
    intent: 'breakeven',
    pattern: /\b(?:lock|secure)\s+(?:in\s+)?(?:some\s+|the\s+|your\s+)?profits?\b/i,
  },
  { id: 'set_be', intent: 'breakeven', pattern: /\b(?:set|put)\s+be\b/i },
  { id: 'bare_be', intent: 'breakeven', pattern: /^\s*be\b/i },
];

const PERCENT_PATTERN = /\b(\d{1,3})\s*%/;
const HALF_PATTERN = /\bhalf\b/i;
const PARTIAL_PATTERN = /\bpartial(?:ly|s)?\b/i;

export interface ManagementInstruction {
  intent: ManagementIntent;
  ruleId: string;
  // Explicit percentage for partial closes; null means the profile default
  percentage: number | null;
}

/**
 * Close rules win over breakeven rules; a close with a percentage, "half"
 * or "partial" becomes a partial close.
 */
export function detectManagementInstruction(text: string): ManagementInstruction | null {
  const close = matchRule(CLOSE_RULES, text);
  if (close) {
    const percent = PERCENT_PATTERN.exec(text);
    if (percent) {
      const value = parseInt(percent[1], 10);
      if (value > 0 && value < 100) {
        return { intent: 'partial_close', ruleId: close.id, percentage: value };
      }
    }
    if (HALF_PATTERN.test(text)) {
      return { intent: 'partial_close', ruleId: close.id, percentage: 50 };
    }
    if (PARTIAL_PATTERN.test(text)) {
      return { intent: 'partial_close', ruleId: close.id, percentage: null };
    }
    return { intent: 'close', ruleId: close.id, percentage: null };
  }

  const breakeven = matchRule(BREAKEVEN_RULES, text);
  return breakeven ? { intent: 'breakeven', ruleId: breakeven.id, percentage: null } : null;
}
