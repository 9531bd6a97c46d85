import OpenAI from 'openai';
import { SummarizationError, errorMessage } from '../errors.js';
import { SUMMARY_SYSTEM_PROMPT, buildSummaryUserPrompt } from './prompts.js';

/** Characters of article text sent to the model. */
export const MAX_CONTENT_CHARS = 12000;

/** Shorter texts are not worth a completion call. */
export const MIN_CONTENT_CHARS = 100;

export const DEFAULT_MODEL = 'gpt-4o-mini';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

/** One chat completion; resolves with the reply text. */
export type ChatCompletionFn = (messages: ChatMessage[]) => Promise<string | null>;

export interface Summarizer {
  /**
   * Resolves with a summary, or null when the text is too short to summarize.
   * Rejects with SummarizationError when the service fails.
   */
  summarize(title: string, fullText: string): Promise<string | null>;
}

/** Cuts at a word boundary and marks the cut with an ellipsis. */
export function truncateContent(text: string, maxChars = MAX_CONTENT_CHARS): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars);
  const lastSpace = cut.search(/\s\S*$/);
  return `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
}

export class ArticleSummarizer implements Summarizer {
  constructor(private readonly complete: ChatCompletionFn) {}

  async summarize(title: string, fullText: string): Promise<string | null> {
    const content = fullText.trim();
    if (content.length < MIN_CONTENT_CHARS) return null;

    let reply: string | null;
    try {
      reply = await this.complete([
        { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
        { role: 'user', content: buildSummaryUserPrompt(title, truncateContent(content)) },
      ]);
    } catch (err) {
      throw new SummarizationError(`Summary request failed: ${errorMessage(err)}`, { cause: err });
    }

    const summary = reply?.trim();
    if (!summary) throw new SummarizationError('Summary request returned no text');
    return summary;
  }
}

export function openAIChatCompletion(client: OpenAI, model: string): ChatCompletionFn {
  return async (messages) => {
    const response = await client.chat.completions.create({
      model,
      messages,
      max_tokens: 500,
      temperature: 0.2,
    });
    return response.choices[0]?.message.content ?? null;
  };
}

/** The SDK retries rate limits and 5xx responses itself. */
export function createOpenAISummarizer(options: { apiKey: string; model?: string }): Summarizer {
  const client = new OpenAI({ apiKey: options.apiKey, maxRetries: 2, timeout: 60_000 });
  return new ArticleSummarizer(openAIChatCompletion(client, options.model ?? DEFAULT_MODEL));
}
