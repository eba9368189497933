/**
 * Text preparation: sanitisation, trailing punctuation and segmentation into
 * chunks the speech API accepts in a single request.
 */

export const MAX_SEGMENT_LENGTH = 1000;

const SENTENCE_END = /[.,?!:;]$/;

/**
 * Replace characters the speech API chokes on with spaces and collapse
 * whitespace
 */
export function sanitizeText(text: string): string {
  return text
    .replace(/[\\|*~<>^()[\]{}\p{Cc}]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Make sure the text ends in punctuation so the last chunk is cut like the rest
 */
export function normalizeTrailingPunctuation(text: string): string {
  if (text.length === 0 || SENTENCE_END.test(text)) {
    return text;
  }
  return `${text}.`;
}

/**
 * Split text into segments of at most `maxLength` characters. Cuts prefer
 * punctuation, then whitespace; a run without either is cut hard.
 *
 * The generator is lazy and restartable: calling it again yields the same
 * sequence.
 */
export function* segmentText(text: string, maxLength: number = MAX_SEGMENT_LENGTH): Generator<string> {
  let rest = normalizeTrailingPunctuation(text.trim());

  while (rest.length > 0) {
    let cut = rest.length;

    if (rest.length > maxLength) {
      const window = rest.slice(0, maxLength + 1);
      cut = lastBoundary(window.slice(0, maxLength), /[.,?!:;]/);
      if (cut === 0) {
        // a space right after the window still ends a full-length word run
        cut = lastBoundary(window, /\s/);
        cut = Math.min(cut, maxLength);
      }
      if (cut === 0) {
        cut = maxLength;
      }
    }

    const segment = rest.slice(0, cut).trim();
    rest = rest.slice(cut).trimStart();

    if (segment.length > 0) {
      yield segment;
    }
  }
}

export function prepareSegments(text: string, maxLength: number = MAX_SEGMENT_LENGTH): string[] {
  return Array.from(segmentText(sanitizeText(text), maxLength));
}

// Index just past the last character matching `pattern`, or 0
function lastBoundary(window: string, pattern: RegExp): number {
  for (let i = window.length - 1; i >= 0; i--) {
    if (pattern.test(window[i])) {
      return i + 1;
    }
  }
  return 0;
}
