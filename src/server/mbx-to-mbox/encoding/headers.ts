/**
 * Folds a header onto continuation lines (LF + tab) so that no line exceeds
 * `maxLineLength`. Breaks only at spaces outside quoted strings, angle
 * brackets and encoded words; a token longer than the limit stays whole.
 */
export function foldHeader(headerName: string, headerValue: string, maxLineLength = 78): string {
  const fullHeader = `${headerName}: ${headerValue}`;
  if (fullHeader.length <= maxLineLength) {
    return fullHeader;
  }

  const label = `${headerName}:`;
  const lines: string[] = [];
  let current = label;

  for (const token of splitAtSafeSpaces(headerValue)) {
    const candidate = `${current} ${token}`;
    if (current === label || candidate.length <= maxLineLength) {
      current = candidate;
    } else {
      lines.push(current);
      current = `\t${token}`;
    }
  }
  lines.push(current);
  return lines.join("\n");
}

function splitAtSafeSpaces(value: string): string[] {
  const tokens: string[] = [];
  let token = "";
  let inQuotes = false;
  let inAngle = false;
  let inEncodedWord = false;

  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    const next = value[i + 1] ?? "";
    if (char === "=" && next === "?") {
      inEncodedWord = true;
    } else if (inEncodedWord && char === "?" && next === "=") {
      inEncodedWord = false;
      token += "?=";
      i++;
      continue;
    } else if (char === '"' && !inEncodedWord) {
      inQuotes = !inQuotes;
    } else if (char === "<" && !inQuotes && !inEncodedWord) {
      inAngle = true;
    } else if (char === ">" && inAngle) {
      inAngle = false;
    }

    if (char === " " && !inQuotes && !inAngle && !inEncodedWord) {
      if (token) tokens.push(token);
      token = "";
    } else {
      token += char;
    }
  }
  if (token) tokens.push(token);
  return tokens;
}
