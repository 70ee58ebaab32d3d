/**
 * Turn a CSV column header into a snake_case identifier.
 *
 * "Patient Survey  Score!" becomes "patient_survey_score". Characters
 * outside a-z, 0-9 and whitespace are dropped before whitespace runs are
 * joined with underscores, so "Score (%)" becomes "score".
 */
export function normalizeColumnName(header: string): string {
  return header
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, "")
    .replace(/\s+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function normalizeHeaders(headers: readonly string[]): string[] {
  return headers.map(normalizeColumnName);
}
