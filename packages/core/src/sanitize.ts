export const CIRCLE_SHA1_MARKER = 'CIRCLE_SHA1=';

const NEWLINE = Buffer.from('\n');

/**
 * Drops every line containing `marker` and rejoins the survivors with `\n`.
 * Leading or trailing empty segments produced by the split are kept as-is.
 */
export const removeMarkerLines = (input: Uint8Array, marker: string): Buffer => {
  const source = Buffer.from(input.buffer, input.byteOffset, input.byteLength);
  const needle = Buffer.from(marker);
  const kept: Buffer[] = [];

  let start = 0;
  while (start <= source.length) {
    const end = source.indexOf(NEWLINE, start);
    const stop = end === -1 ? source.length : end;
    const line = source.subarray(start, stop);
    if (line.indexOf(needle) === -1) {
      kept.push(line);
    }
    if (end === -1) {
      break;
    }
    start = end + 1;
  }

  const joined: Buffer[] = [];
  kept.forEach((line, index) => {
    if (index > 0) {
      joined.push(NEWLINE);
    }
    joined.push(line);
  });
  return Buffer.concat(joined);
};

export const sanitize = (input: Uint8Array): Buffer => removeMarkerLines(input, CIRCLE_SHA1_MARKER);
