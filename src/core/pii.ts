import { PIIFinding, PiiCategory } from "../types/contracts.js";
import { piiRules, PiiRule } from "../presets/pii.v1.js";

export function scan(text: string, rules: PiiRule[] = piiRules): PIIFinding[] {
  const findings: PIIFinding[] = [];

  for (const rule of rules) {
    // d gives the offsets of capture groups
    const pattern = rule.pattern.hasIndices ? rule.pattern : new RegExp(rule.pattern.source, rule.pattern.flags + "d");
    for (const m of text.matchAll(pattern)) {
      const group = rule.group ?? 0;
      const value = m[group];
      const span = m.indices?.[group];
      if (value === undefined || !span) continue;
      if (rule.validate && !rule.validate(value)) continue;

      findings.push({
        category: rule.category,
        start: span[0],
        end: span[1],
        text: value,
        confidence: rule.confidence,
        rule: rule.id
      });
    }
  }

  return findings.sort((a, b) => a.start - b.start || b.end - a.end);
}

export function hasEscalatingFinding(findings: PIIFinding[], threshold: number): boolean {
  return findings.some(f => f.confidence >= threshold);
}

type Span = { start: number; end: number; category: PiiCategory; confidence: number };

/** Overlapping or touching spans collapse into one; the strongest finding names it. */
export function mergeSpans(findings: PIIFinding[]): Span[] {
  const sorted = [...findings].sort((a, b) => a.start - b.start || b.end - a.end);
  const out: Span[] = [];

  for (const f of sorted) {
    const last = out[out.length - 1];
    if (last && f.start <= last.end) {
      last.end = Math.max(last.end, f.end);
      if (f.confidence > last.confidence) {
        last.category = f.category;
        last.confidence = f.confidence;
      }
      continue;
    }
    out.push({ start: f.start, end: f.end, category: f.category, confidence: f.confidence });
  }

  return out;
}

export function placeholderFor(category: PiiCategory): string {
  return `[${category.toUpperCase()}]`;
}

export function redact(text: string, findings: PIIFinding[]): string {
  if (findings.length === 0) return text;

  let out = "";
  let cursor = 0;
  for (const span of mergeSpans(findings)) {
    out += text.slice(cursor, span.start) + placeholderFor(span.category);
    cursor = span.end;
  }
  return out + text.slice(cursor);
}
