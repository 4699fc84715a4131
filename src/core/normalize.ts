export function normalizeText(s: string): string {
  return s
    .replace(/\r\n/g, "\n")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim()
    .toLowerCase();
}

const STOPWORDS = new Set([
  "the", "and", "for", "are", "you", "your", "with", "what", "when", "where", "how",
  "can", "does", "this", "that", "have", "has", "was", "our", "from", "about", "is", "to", "of"
]);

/** Lower-cased content words, in order, without duplicates. */
export function terms(s: string): string[] {
  const words = normalizeText(s).split(/[^\p{L}\p{N}]+/u);
  const out: string[] = [];
  for (const w of words) {
    if (w.length < 3 || STOPWORDS.has(w) || out.includes(w)) continue;
    out.push(w);
  }
  return out;
}
