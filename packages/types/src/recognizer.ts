/**
 * Entity recognition collaborator
 */

export interface RecognizedEntity {
  text: string;
  /** Open-ended short tag, e.g. PERSON, ORG, GPE, DATE */
  label: string;
  /** Start character offset in the text given to recognize() */
  start: number;
  end: number;
  confidence?: number;
}

export interface EntityRecognizer {
  /**
   * Find named entities in a text span.
   * Must be safe to call repeatedly with the same input.
   */
  recognize(text: string): Promise<RecognizedEntity[]>;
}
