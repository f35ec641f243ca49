// apps/api/src/common/utils/email.ts
export const normalizeEmail = (raw?: string | null): string | null => {
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim().toLowerCase();
  // a value without '@' is not treated as an address
  return trimmed.includes('@') ? trimmed : null;
};
