import { FIELD_KEYS, type ContactDetails, type FieldKey, type FieldMap, type LeadProfile } from '../types/index.js';

export type FieldUpdate = FieldMap;

const SUMMARY_LABELS: Array<[FieldKey, string]> = [
  ['need', 'need'],
  ['pain_point', 'pain point'],
  ['budget', 'budget'],
  ['timeline', 'timeline'],
  ['product_interest', 'interested in'],
];

/**
 * Trim a candidate value; whitespace-only counts as empty
 */
export function normalizeFieldValue(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function hasField(fields: FieldMap, key: FieldKey): boolean {
  return normalizeFieldValue(fields[key]) !== undefined;
}

export function missingFields(fields: FieldMap, keys: readonly FieldKey[] = FIELD_KEYS): FieldKey[] {
  return keys.filter(key => !hasField(fields, key));
}

export function updatedKeys(update: FieldUpdate): FieldKey[] {
  return FIELD_KEYS.filter(key => update[key] !== undefined);
}

/**
 * One-line digest of what we know about the lead
 */
export function buildProfileSummary(fields: FieldMap): string {
  const parts: string[] = [];

  let who = fields.name ?? '';
  if (fields.role) {
    who = who ? `${who}, ${fields.role}` : fields.role;
  }
  if (fields.company) {
    who = who ? `${who} at ${fields.company}` : fields.company;
  }
  if (who) {
    parts.push(who);
  }

  for (const [key, label] of SUMMARY_LABELS) {
    const value = fields[key];
    if (value) {
      parts.push(`${label}: ${value}`);
    }
  }

  return parts.join('; ');
}

export function createEmptyProfile(): LeadProfile {
  return { fields: {}, contact: {}, summary: '' };
}

/**
 * Build a profile from previously known lead data (e.g. a returning lead)
 */
export function createProfile(seed: { fields?: FieldMap; contact?: ContactDetails } = {}): LeadProfile {
  const merged = mergeFieldUpdate(createEmptyProfile(), seed.fields ?? {});
  return mergeContactDetails(merged.profile, seed.contact ?? {});
}

/**
 * Last-non-empty-wins merge. Empty values never clear a captured field and
 * identical values are not reported as changes.
 */
export function mergeFieldUpdate(
  profile: LeadProfile,
  update: FieldUpdate
): { profile: LeadProfile; changed: FieldUpdate } {
  const fields: FieldMap = { ...profile.fields };
  const changed: FieldUpdate = {};

  for (const key of FIELD_KEYS) {
    const incoming = normalizeFieldValue(update[key]);
    if (incoming === undefined || incoming === fields[key]) {
      continue;
    }
    fields[key] = incoming;
    changed[key] = incoming;
  }

  if (updatedKeys(changed).length === 0) {
    return { profile, changed };
  }

  return {
    profile: { ...profile, fields, summary: buildProfileSummary(fields) },
    changed,
  };
}

export function mergeContactDetails(profile: LeadProfile, contact: ContactDetails): LeadProfile {
  const email = normalizeFieldValue(contact.email);
  const phone = normalizeFieldValue(contact.phone);
  if (!email && !phone) {
    return profile;
  }
  return {
    ...profile,
    contact: {
      ...profile.contact,
      ...(email ? { email } : {}),
      ...(phone ? { phone } : {}),
    },
  };
}

/**
 * Deep, frozen copy handed to collaborators so they cannot mutate the owner's record
 */
export function snapshotProfile(profile: LeadProfile): Readonly<LeadProfile> {
  const copy = structuredClone(profile);
  Object.freeze(copy.fields);
  Object.freeze(copy.contact);
  return Object.freeze(copy);
}
