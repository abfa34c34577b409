export const FAMILY_CODE_PATTERN = /^[A-Z]+-[A-Z]+-\d{3}$/;
export const UNKNOWN_TOKEN = 'UNKNOWN';
export const MAX_FAMILY_SEQUENCE = 999;

/** Upper-cased ASCII letters only; accents are folded first. */
export function normalizeCodeToken(value: string | null | undefined): string {
  const token = (value ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .replace(/[^A-Z]/g, '');
  return token || UNKNOWN_TOKEN;
}

export function composeFamilyCode(surname: string, location: string, sequence: number): string {
  if (!Number.isInteger(sequence) || sequence < 1 || sequence > MAX_FAMILY_SEQUENCE) {
    throw new Error(`family_sequence_out_of_range:${sequence}`);
  }
  return `${normalizeCodeToken(surname)}-${normalizeCodeToken(location)}-${String(sequence).padStart(3, '0')}`;
}

export function parseFamilyCode(
  code: string,
): { surname: string; location: string; sequence: number } | null {
  if (!FAMILY_CODE_PATTERN.test(code)) return null;
  const [surname = '', location = '', sequence = ''] = code.split('-');
  return { surname, location, sequence: Number.parseInt(sequence, 10) };
}
