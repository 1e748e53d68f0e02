// Input validation and sanitization utilities

import { ValidationError } from './errors.js';

/**
 * Maximum lengths for various fields
 */
export const MAX_LENGTHS = {
  identifier: 100,
  reviewName: 200,
  participantName: 100,
  email: 254,
  description: 5000,
  comment: 10000
};

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g;

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Validates and trims an entity, comment or session identifier
 */
export function validateIdentifier(id: string, field: string = 'id'): string {
  const trimmed = (id ?? '').trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Identifier is required', field);
  }

  if (trimmed.length > MAX_LENGTHS.identifier) {
    throw new ValidationError(`Identifier exceeds maximum length of ${MAX_LENGTHS.identifier}`, field);
  }

  return trimmed;
}

/**
 * Validates and trims a review name
 */
export function validateReviewName(name: string): string {
  const trimmed = (name ?? '').trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Review name cannot be empty', 'name');
  }

  if (trimmed.length > MAX_LENGTHS.reviewName) {
    throw new ValidationError(`Review name exceeds maximum length of ${MAX_LENGTHS.reviewName}`, 'name');
  }

  return trimmed;
}

/**
 * Validates a participant name
 */
export function validateParticipantName(name: string): string {
  const trimmed = (name ?? '').trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Participant name cannot be empty', 'name');
  }

  if (trimmed.length > MAX_LENGTHS.participantName) {
    throw new ValidationError(
      `Participant name exceeds maximum length of ${MAX_LENGTHS.participantName}`,
      'name'
    );
  }

  return trimmed;
}

/**
 * Validates an email address; empty is allowed (email is optional)
 */
export function validateEmail(email: string): string {
  const trimmed = (email ?? '').trim();

  if (trimmed.length === 0) {
    return '';
  }

  if (trimmed.length > MAX_LENGTHS.email || !EMAIL_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid email address: ${trimmed}`, 'email');
  }

  return trimmed;
}

/**
 * Strips control characters and enforces a maximum length on free text
 */
export function sanitizeText(text: string, field: string, maxLength: number): string {
  const cleaned = (text ?? '').replace(CONTROL_CHARS, '');

  if (cleaned.length > maxLength) {
    throw new ValidationError(`${field} exceeds maximum length of ${maxLength}`, field);
  }

  return cleaned;
}

/**
 * True when the string has no visible content
 */
export function isBlank(text: string | undefined | null): boolean {
  return text === undefined || text === null || text.trim().length === 0;
}

/**
 * Parses a date argument (ISO date or date-time)
 */
export function parseDate(value: string, field: string = 'date'): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid date: ${value}`, field);
  }
  return date;
}
