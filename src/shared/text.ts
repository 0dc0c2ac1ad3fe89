/** Cut a UTF-8 buffer to at most `maxBytes` without splitting a character. */
export function truncateUtf8(buffer: Buffer, maxBytes: number): { text: string; bytes: number } {
  if (buffer.length <= maxBytes) return { text: buffer.toString("utf-8"), bytes: buffer.length };
  let cut = maxBytes;
  // Continuation bytes are 10xxxxxx; back up to the first byte of that character.
  while (cut > 0 && (buffer[cut] & 0xc0) === 0x80) cut--;
  return { text: buffer.subarray(0, cut).toString("utf-8"), bytes: cut };
}
