import { InvalidParameterError } from '../../errors.js';

// An unpaired high or low surrogate
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * UTF-8 bytes of `text`. Lone surrogates are rejected rather than replaced
 * with U+FFFD, so distinct strings never encode to the same bytes.
 */
export const utf8Bytes = (text: string, name: string): Buffer => {
  const match = LONE_SURROGATE.exec(text);
  if (match) {
    throw new InvalidParameterError(name, `unpaired surrogate at index ${match.index}`);
  }
  return Buffer.from(text, 'utf-8');
};
