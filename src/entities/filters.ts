import type { EntityType } from '../types/job.js';

const SKU_CODE = /^[A-Z]{3}-[A-Z]{2}-\d{4}$/;

/** Drops obvious tagging noise: single characters, table fragments, bare numbers, product codes. */
export function shouldKeepEntity(text: string): boolean {
  const cleaned = text.trim();

  if (cleaned.length <= 1) return false;
  if (/[\r\n]/.test(text)) return false;
  if (/^\d+$/.test(cleaned)) return false;
  if (SKU_CODE.test(text.toUpperCase())) return false;

  return true;
}

export function reclassifyEntity(text: string, type: EntityType): EntityType {
  if (type === 'person' && text.toLowerCase().includes('governorate')) {
    return 'location';
  }
  return type;
}
