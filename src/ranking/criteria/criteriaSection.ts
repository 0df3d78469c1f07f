/**
 * Criterion-section extraction
 *
 * Slices the guidance for one criterion out of the full criteria document.
 * A heading line (one containing `#`) that mentions the criterion name opens
 * the section; the next line starting with `#` that does not mention the
 * name closes it. A later heading that mentions the name again before the
 * section closes moves the start forward.
 */

export function extractCriterionSection(criteriaText: string, criterionName: string): string {
  const lines = criteriaText.split('\n');
  const needle = criterionName.toLowerCase();
  let start: number | null = null;
  let end: number | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const mentions = line.toLowerCase().includes(needle);

    if (mentions && line.includes('#')) {
      start = i;
    } else if (start !== null && line.trim().startsWith('#') && !mentions) {
      end = i;
      break;
    }
  }

  if (start === null) {
    return criteriaText;
  }

  return lines.slice(start, end ?? lines.length).join('\n');
}
