import type { EntityMap, EntityMention } from "./types";

export const ENTITY_LABELS = ["PERSON", "ORGANIZATION", "LOCATION", "PRODUCT", "MONEY", "EVENT", "DATE"] as const;

export const MAX_ENTITY_TEXT = 4000;

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(code: number): string {
  return code > MAX_CODE_POINT ? " " : String.fromCodePoint(code);
}

function decodeEntity(match: string, body: string): string {
  if (body.startsWith("#x") || body.startsWith("#X")) {
    const code = Number.parseInt(body.slice(2), 16);
    return Number.isNaN(code) ? match : fromCodePoint(code);
  }
  if (body.startsWith("#")) {
    const code = Number.parseInt(body.slice(1), 10);
    return Number.isNaN(code) ? match : fromCodePoint(code);
  }
  return NAMED_ENTITIES[body.toLowerCase()] ?? " ";
}

/**
 * Reduce scraped page text to plain prose for the entity service.
 */
export function sanitizeText(text: string, maxLength: number = MAX_ENTITY_TEXT): string {
  let cleaned = text.replace(/<[^>]+>/g, " ");
  cleaned = cleaned.replace(/&(#[xX]?[0-9a-fA-F]+|[a-zA-Z]+);/g, decodeEntity);
  cleaned = cleaned.replace(/!\[[^\]]*\]\([^)]*\)/g, " ");      // images
  cleaned = cleaned.replace(/\[([^\]]*)\]\([^)]*\)/g, "$1");     // links keep their text
  cleaned = cleaned.replace(/^#{1,6}\s*/gm, "");
  cleaned = cleaned.replace(/https?:\/\/\S+/g, " ");
  cleaned = cleaned.replace(/[<>[\]]/g, " ");
  cleaned = cleaned.replace(/[\u0000-\u001f\u007f]/g, " ");
  cleaned = cleaned.replace(/\s+/g, " ").trim();
  return cleaned.slice(0, maxLength);
}

/**
 * Group a flat mention list by label, keeping first-seen order and dropping
 * duplicates within a label.
 */
export function groupEntities(mentions: EntityMention[]): EntityMap {
  const grouped: EntityMap = {};
  for (const { label, text } of mentions) {
    const value = text.trim();
    if (!value) continue;
    const bucket = grouped[label] ?? [];
    if (!bucket.includes(value)) bucket.push(value);
    grouped[label] = bucket;
  }
  return grouped;
}
