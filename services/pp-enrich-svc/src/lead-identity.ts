import { createHash } from 'node:crypto';

import { badRequestError } from '@pp/common';

import type { LeadInput } from './types';

const IDENTITY_FIELDS = ['company', 'name', 'contact', 'domain'] as const;

function normalizeText(value: unknown): string {
  if (typeof value !== 'string') {
    return '';
  }
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function companyOf(input: LeadInput): string | undefined {
  const company = typeof input.company === 'string' ? input.company.trim() : '';
  if (company.length > 0) {
    return company;
  }
  const name = typeof input.name === 'string' ? input.name.trim() : '';
  return name.length > 0 ? name : undefined;
}

/**
 * Key that repeated submissions of the same lead share: normalized company
 * (or name) plus contact (or domain).
 */
export function leadIdentityKey(input: LeadInput): string {
  const company = normalizeText(input.company) || normalizeText(input.name);
  const contact = normalizeText(input.contact) || normalizeText(input.domain);
  if (!company && !contact) {
    throw badRequestError('Lead input needs at least one of company, name, contact or domain.', {
      fields: [...IDENTITY_FIELDS]
    });
  }
  return `${company}|${contact}`;
}

export function deriveLeadId(input: LeadInput): string {
  return createHash('sha1').update(leadIdentityKey(input)).digest('hex');
}
