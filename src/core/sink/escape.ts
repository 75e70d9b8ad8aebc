/**
 * String literal escaping shared by the N-Triples and Turtle sinks.
 *
 * `\\`, `"`, `\n`, `\r`, `\t` get short escapes; any other code unit below
 * 0x20 becomes `\uXXXX` (uppercase hex). Everything else passes through.
 */
export function escapeLiteral(value: string): string {
  let escaped = "";
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    const code = value.charCodeAt(i);
    switch (ch) {
      case "\\":
        escaped += "\\\\";
        break;
      case '"':
        escaped += '\\"';
        break;
      case "\n":
        escaped += "\\n";
        break;
      case "\r":
        escaped += "\\r";
        break;
      case "\t":
        escaped += "\\t";
        break;
      default:
        escaped += code < 0x20 ? `\\u${code.toString(16).toUpperCase().padStart(4, "0")}` : ch;
    }
  }
  return escaped;
}
