/**
 * Log-safe rendering of user-supplied text (course names, file names,
 * comment previews): whitespace controls become spaces, other control
 * characters are dropped, and the result is cut to maxLength code points
 * so multi-byte text is never split inside a character.
 */
export function sanitizeForLog(input: string, maxLength = 100): string {
  const cleaned = Array.from(input.replace(/[\r\n\t]/g, ' '))
    .filter((char) => {
      const code = char.codePointAt(0) ?? 0;
      return code >= 32 && code !== 127;
    })
    .join('')
    .trim();
  return Array.from(cleaned).slice(0, maxLength).join('');
}

/**
 * Bound a message for storage in a fixed-size column.
 * Messages longer than maxLength end with an ellipsis and still fit.
 */
export function truncateMessage(message: string, maxLength: number): string {
  if (message.length <= maxLength) {
    return message;
  }
  if (maxLength <= 3) {
    return message.substring(0, maxLength);
  }
  return `${message.substring(0, maxLength - 3)}...`;
}
