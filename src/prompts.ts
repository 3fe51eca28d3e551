export function getTranslationSystemPrompt(): string {
  return `You are a professional literary translator. Translate the text you are given accurately while preserving:

1. **Paragraph structure**: keep every paragraph break exactly where it appears in the source
2. **Formatting**: keep line breaks, quotation marks, dashes and other punctuation
3. **Special characters**: do not drop or rewrite symbols, numbers or proper names

Guidelines:
- Translate naturally for the target language while keeping the tone of the source
- Do not summarise, shorten or add to the text

Respond with ONLY the translated text, without any explanations or additional commentary.`;
}

export function getTranslationUserPrompt(
  text: string,
  sourceLanguage: string,
  targetLanguage: string
): string {
  return `Please translate the following ${sourceLanguage} text to ${targetLanguage}.
Maintain the original formatting, paragraph structure, and preserve any special characters or punctuation.
Only return the translated text without any additional commentary.

Text to translate:
${text}`;
}
