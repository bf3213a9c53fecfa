const EMAIL_PATTERNS = [
  /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  // PDF extraction sometimes splits addresses around the separators
  /\b[A-Za-z0-9._%+-]+\s*@\s*[A-Za-z0-9.-]+\s*\.\s*[A-Za-z]{2,}\b/g
];

/** Email addresses found in the text, lower-cased, in order of first appearance. */
export function extractEmails(text: string): string[] {
  const matches: Array<{ index: number; email: string }> = [];
  for (const pattern of EMAIL_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      matches.push({
        index: match.index ?? 0,
        email: match[0].replace(/\s+/g, '').toLowerCase()
      });
    }
  }

  const found: string[] = [];
  for (const { email } of matches.sort((a, b) => a.index - b.index)) {
    if (!found.includes(email)) {
      found.push(email);
    }
  }
  return found;
}
