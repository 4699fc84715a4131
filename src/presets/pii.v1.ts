import { PiiCategory } from "../types/contracts.js";

export const presetId = "pii.v1";

export interface PiiRule {
  id: string;
  category: PiiCategory;
  pattern: RegExp;
  confidence: number;
  /** capture group holding the sensitive part; 0 = whole match */
  group?: number;
  validate?: (match: string) => boolean;
}

// Patterns must carry the g flag; scan() iterates them with matchAll and adds d for group offsets.
export const piiRules: PiiRule[] = [
  {
    id: "name.introduction",
    category: "name",
    pattern: /\b(?:[Mm]y name is|[Mm]y name's|[Nn]ame:|[Ii] am called|[Cc]all me)\s+([A-Z][a-z'-]+(?:\s+[A-Z][a-z'-]+){0,2})/g,
    confidence: 0.85,
    group: 1
  },
  {
    id: "name.title",
    category: "name",
    pattern: /\b(?:Mr|Mrs|Ms|Miss|Mx|Dr)\.?\s+[A-Z][a-z'-]+(?:\s+[A-Z][a-z'-]+)?/g,
    confidence: 0.75
  },
  {
    id: "contact.email",
    category: "contact",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    confidence: 0.99
  },
  {
    id: "contact.phone",
    category: "contact",
    pattern: /(?:\+\d{1,3}[\s-]?)?\(?\b\d{2,5}\)?[\s-]?\d{3,4}[\s-]?\d{3,4}\b/g,
    confidence: 0.8,
    validate: (m) => digitsOf(m).length >= 10 && digitsOf(m).length <= 13
  },
  {
    id: "financial.card",
    category: "financial",
    pattern: /\b\d(?:[ -]?\d){12,18}\b/g,
    confidence: 0.95,
    validate: (m) => luhnValid(digitsOf(m))
  },
  {
    id: "financial.iban",
    category: "financial",
    pattern: /\b[A-Z]{2}\d{2}(?:\s?[A-Z0-9]{4}){2,7}(?:\s?[A-Z0-9]{1,3})?\b/g,
    confidence: 0.9
  },
  {
    id: "financial.sort_code",
    category: "financial",
    pattern: /\b\d{2}-\d{2}-\d{2}\b/g,
    confidence: 0.7
  },
  {
    id: "identifier.national_insurance",
    category: "identifier",
    pattern: /\b[A-CEGHJ-PR-TW-Z]{2}\s?\d{2}\s?\d{2}\s?\d{2}\s?[A-D]\b/g,
    confidence: 0.9
  },
  {
    id: "address.postcode",
    category: "address",
    pattern: /\b[A-Z]{1,2}\d[A-Z\d]?\s?\d[A-Z]{2}\b/g,
    confidence: 0.85
  },
  {
    id: "address.street",
    category: "address",
    pattern: /\b\d{1,5}[A-Za-z]?\s+(?:[A-Z][a-z]+\s+){1,3}(?:Street|St|Road|Rd|Avenue|Ave|Lane|Ln|Drive|Close|Way|Court|Place|Crescent|Terrace)\b/g,
    confidence: 0.8
  }
];

export function digitsOf(s: string): string {
  return s.replace(/\D/g, "");
}

export function luhnValid(digits: string): boolean {
  if (digits.length < 13 || digits.length > 19) return false;
  let sum = 0;
  let double = false;
  for (let i = digits.length - 1; i >= 0; i--) {
    let d = Number(digits[i]);
    if (double) {
      d *= 2;
      if (d > 9) d -= 9;
    }
    sum += d;
    double = !double;
  }
  return sum % 10 === 0;
}
