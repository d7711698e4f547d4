/** Output file naming: `{barangay}_{lastname}_{NNN}.docx` with fallbacks. */

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

export const BARANGAY_MAX_LENGTH = 15;
export const LASTNAME_WITH_BARANGAY_MAX_LENGTH = 15;
export const LASTNAME_MAX_LENGTH = 20;

/** Replace characters Windows rejects in file names, then truncate. */
export function sanitizeFileNamePart(value: string, maxLength: number): string {
  const clean = value.trim().replace(INVALID_FILENAME_CHARS, "_");
  return Array.from(clean).slice(0, maxLength).join("");
}

/** `index` is the 1-based position in the batch. */
export function deriveFileName(barangay: string, lastName: string, index: number): string {
  const seq = String(index).padStart(3, "0");
  const brgy = barangay.trim();
  const lname = lastName.trim();

  if (brgy && lname) {
    return `${sanitizeFileNamePart(brgy, BARANGAY_MAX_LENGTH)}_${sanitizeFileNamePart(lname, LASTNAME_WITH_BARANGAY_MAX_LENGTH)}_${seq}.docx`;
  }
  if (lname) {
    return `${sanitizeFileNamePart(lname, LASTNAME_MAX_LENGTH)}_${seq}.docx`;
  }
  return `document_${seq}.docx`;
}
