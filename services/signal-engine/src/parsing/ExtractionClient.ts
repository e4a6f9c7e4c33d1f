import OpenAI from 'openai';
import { ExtractionConfig } from '@signalbridge/shared-config';
import { Logger } from '@signalbridge/shared-utils';

const logger = new Logger('ExtractionClient');

/**
 * Structured extraction service. Resolves to the decoded JSON reply
 * (an object, or null when the text is not a trading signal).
 */
export interface SignalExtractionClient {
  extract(text: string): Promise<unknown>;
}

const PROMPT = `
You extract forex and CFD trading signals from chat messages.

Reply with exactly one JSON object and nothing else:
{"instrument": "XAUUSD", "order_type": "buy", "entry_point": 2350.0, "stop_loss": 2340.0, "take_profits": [2360.0, 2370.0]}

Rules:
- order_type is "buy" or "sell".
- entry_point and stop_loss are single numbers. When the message gives a range, use its first value.
- take_profits is always an array of numbers, in the order given.
- Keep at most the first 3 take profits, except for indices (DJI30, US30, NDX100, NAS100) where you keep all of them.
- Canonical instrument names: US30, DOW, DOW.C -> DJI30; NAS100, NSDQ -> NDX100; GOLD -> XAUUSD; SILVER -> XAGUSD.
  Forex pairs are written as 6 letters without separators (EUR/USD -> EURUSD).
- If the message is not a new trade signal (results, commentary, management updates), reply with: null
`.trim();

/**
 * Decode a model reply, which may arrive wrapped in a markdown code block
 */
export function parseExtractionReply(content: string): unknown {
  let jsonStr = content.trim();
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.replace(/^```(?:json)?\s*\n?/, '').replace(/\n?```$/, '').trim();
  }
  return JSON.parse(jsonStr);
}

export class OpenAIExtractionClient implements SignalExtractionClient {
  private openai: OpenAI;

  constructor(private config: ExtractionConfig, client?: OpenAI) {
    this.openai =
      client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        timeout: config.timeoutMs,
        maxRetries: 1,
      });
  }

  async extract(text: string): Promise<unknown> {
    const response = await this.openai.chat.completions.create({
      model: this.config.model,
      temperature: 0,
      max_tokens: 300,
      messages: [
        { role: 'system', content: PROMPT },
        { role: 'user', content: text },
      ],
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error('No response from extraction service');
    }

    logger.debug(`[OpenAIExtractionClient] Reply: ${content}`);
    return parseExtractionReply(content);
  }
}
