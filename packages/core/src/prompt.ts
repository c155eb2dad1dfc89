/** Marks where the model's answer starts in the generated text. */
export const ANSWER_DELIMITER = "Answer:";

/**
 * Grounded question-answering prompt. The context is embedded verbatim and the
 * prompt ends with {@link ANSWER_DELIMITER} so the completion can be located.
 */
export function buildPrompt(question: string, context: string): string {
  return [
    "You are a research assistant answering questions about scientific papers.",
    "Use only the information in the context below. Cite the papers you rely on by their title.",
    'If the context does not contain the answer, say "I could not find this in the provided papers."',
    "",
    "Context:",
    context,
    "",
    `Question: ${question}`,
    "",
    ANSWER_DELIMITER,
  ].join("\n");
}
