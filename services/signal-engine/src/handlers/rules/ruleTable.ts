/**
 * Pattern -> intent rule, evaluated in table order
 */
export interface TextRule<TIntent extends string> {
  id: string;
  intent: TIntent;
  pattern: RegExp;
}

export interface RuleMatch<TIntent extends string> {
  id: string;
  intent: TIntent;
}

export function matchRule<TIntent extends string>(
  rules: ReadonlyArray<TextRule<TIntent>>,
  text: string
): RuleMatch<TIntent> | null {
  const rule = rules.find(candidate => candidate.pattern.test(text));
  return rule ? { id: rule.id, intent: rule.intent } : null;
}

/**
 * First capture group of the first pattern that matches
 */
export function captureFirst(patterns: readonly RegExp[], text: string): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match && match[1] !== undefined) {
      return match[1];
    }
  }
  return null;
}
