import type { Codebook, Document, PromptOptions } from '../types.js';
import { PromptTemplateError } from '../library/errors.js';
import { formatCodebook } from '../codebook/codebook.js';

const REQUIRED_PLACEHOLDERS = ['{text}', '{codebook}'] as const;
const PLACEHOLDER = /\{(text|codebook|doc_id|speakers)\}/g;
const UNKNOWN_SPEAKERS = 'Unknown';

/**
 * Default scoring instruction for the confidence field.
 */
export const DEFAULT_SCORING_CRITERIA =
  'Provide an ordinal score (0=construct is not mentioned or is negated, 1 = indirect mention or not clear, 2 = clear and prototypical mention of the construct) as to whether the interview clearly mentions the construct, according to its definition and examples.';

/**
 * Builds the default prompt template around a scoring instruction.
 * The returned template still holds the {doc_id}, {speakers}, {text} and {codebook}
 * placeholders.
 */
function buildDefaultTemplate(scoringCriteria: string): string {
  return `You are analyzing an interview transcript to identify and extract instances of psychological constructs.

Document ID: {doc_id}
Speakers in this document: {speakers}

Text to analyze:
{text}

Codebook of constructs:
{codebook}

Instructions:
1. Identify which constructs from the codebook appear in the text
2. For each construct found, extract ALL instances where it appears
3. For each instance, provide:
   - Document ID (use exactly: {doc_id})
   - Speaker ID (use the EXACT speaker ID from the transcript, e.g., {speakers})
   - The construct name (use the exact name from the codebook)
   - An exact quote from the text
   - ${scoringCriteria}

Format your response EXACTLY like this:
DOC_ID: {doc_id}
SPEAKER_ID: [use exact speaker ID from transcript]
CONSTRUCT: [construct name]
QUOTE: [exact quote from text]
CONFIDENCE: [score]

(Continue for all instances of all constructs found)

Your response:`;
}

/**
 * Default prompt template.
 */
export const DEFAULT_PROMPT = buildDefaultTemplate(DEFAULT_SCORING_CRITERIA);

/**
 * Resolve prompt options to a template.
 *
 * - no options: the default template
 * - `scoringCriteria`: the default template with that scoring instruction
 * - `template`: a custom template, which must contain {text} and {codebook}
 *
 * @throws PromptTemplateError on an invalid combination or template
 */
export function createPromptTemplate(options: PromptOptions = {}): string {
  const { template, scoringCriteria } = options;

  if (template !== undefined && scoringCriteria !== undefined) {
    throw new PromptTemplateError(
      'scoringCriteria only applies to the default prompt; include it in the custom template instead'
    );
  }

  if (template !== undefined) {
    const missing = REQUIRED_PLACEHOLDERS.filter((p) => !template.includes(p));
    if (missing.length > 0) {
      throw new PromptTemplateError(
        `Custom prompt must contain {text} and {codebook} placeholders (missing: ${missing.join(', ')})`
      );
    }
    return template;
  }

  if (scoringCriteria !== undefined) {
    if (!scoringCriteria.trim()) {
      throw new PromptTemplateError('scoringCriteria cannot be empty');
    }
    return buildDefaultTemplate(scoringCriteria.trim());
  }

  return DEFAULT_PROMPT;
}

/**
 * Values substituted into a prompt template.
 */
export interface PromptValues {
  text: string;
  codebook: string;
  docId: string;
  speakers: readonly string[];
}

/**
 * Fill the {text}, {codebook}, {doc_id} and {speakers} placeholders.
 * Any other braces in the template are left as they are.
 */
export function formatPrompt(template: string, values: PromptValues): string {
  const replacements: Record<string, string> = {
    text: values.text,
    codebook: values.codebook,
    doc_id: values.docId,
    speakers: values.speakers.length > 0 ? values.speakers.join(', ') : UNKNOWN_SPEAKERS,
  };
  return template.replace(PLACEHOLDER, (match, key: string) => replacements[key] ?? match);
}

/**
 * Format the prompt for one document against a codebook.
 */
export function buildDocumentPrompt(
  template: string,
  document: Document,
  codebook: Codebook
): string {
  return formatPrompt(template, {
    text: document.content,
    codebook: formatCodebook(codebook),
    docId: document.id,
    speakers: document.speakers,
  });
}
