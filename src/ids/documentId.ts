export interface DocumentId {
  community: string;
  sequence: number;
}

export class InvalidDocumentIdError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid document id "${input}": ${reason}`);
    this.name = "InvalidDocumentIdError";
    this.input = input;
  }
}

const DIGITS = /^\d+$/;

export function createDocumentId(community: string, sequence: number): DocumentId {
  const label = `${community}-${sequence}`;
  if (!DIGITS.test(community)) {
    throw new InvalidDocumentIdError(label, "community must be numeric");
  }
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new InvalidDocumentIdError(label, "sequence must be a positive integer");
  }
  return { community, sequence };
}

export function parseDocumentId(text: string): DocumentId {
  const trimmed = text.trim();
  const parts = trimmed.split("-");
  if (parts.length !== 2) {
    throw new InvalidDocumentIdError(text, "expected exactly one '-'");
  }

  const [community, sequenceText] = parts;
  if (!DIGITS.test(community) || !DIGITS.test(sequenceText)) {
    throw new InvalidDocumentIdError(text, "community and sequence must be numeric");
  }

  return createDocumentId(community, Number.parseInt(sequenceText, 10));
}

export function tryParseDocumentId(text: string): DocumentId | undefined {
  try {
    return parseDocumentId(text);
  } catch (error) {
    if (error instanceof InvalidDocumentIdError) {
      return undefined;
    }
    throw error;
  }
}

export function formatDocumentId(id: DocumentId): string {
  return `${id.community}-${String(id.sequence).padStart(2, "0")}`;
}

export function sameCommunity(a: DocumentId, b: DocumentId): boolean {
  return a.community === b.community;
}
