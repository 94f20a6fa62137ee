import { invalidConfig, invalidField } from '../../errors/taxonomy.js';
import { isUnitInterval } from '../math/decimal.js';

export const TEXT_BOUNDS = {
  title: { min: 4, max: 64 },
  description: { min: 4, max: 1024 },
  link: { min: 12, max: 128 },
} as const;

type BoundedField = keyof typeof TEXT_BOUNDS;

const LABELS: Record<BoundedField, string> = {
  title: 'Title',
  description: 'Description',
  link: 'Link',
};

// Bounds count code points, not UTF-16 units.
function validateLength(field: BoundedField, value: string): void {
  const { min, max } = TEXT_BOUNDS[field];
  const length = [...value].length;
  if (length < min) {
    throw invalidField(`${LABELS[field]} too short`);
  }
  if (length > max) {
    throw invalidField(`${LABELS[field]} too long`);
  }
}

export function validatePollText(input: { title: string; description: string; link?: string }): void {
  validateLength('title', input.title);
  validateLength('description', input.description);
  if (input.link !== undefined) {
    validateLength('link', input.link);
  }
}

export function validateQuorum(quorum: bigint): void {
  if (!isUnitInterval(quorum)) {
    throw invalidConfig('quorum must be 0 to 1');
  }
}

export function validateThreshold(threshold: bigint): void {
  if (!isUnitInterval(threshold)) {
    throw invalidConfig('threshold must be 0 to 1');
  }
}
