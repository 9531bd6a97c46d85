export const SUMMARY_SYSTEM_PROMPT = `You are a factual summarization assistant. Given a news article, produce a concise, neutral summary.
Output format: 3 to 5 bullet points, or one short paragraph. Be factual only; do not add opinion or speculation.`;

export function buildSummaryUserPrompt(title: string, content: string): string {
  return `Summarize this news article in a neutral, factual way (3–5 bullet points or one short paragraph):

Title: ${title || 'Untitled'}

Content:
${content}`;
}
