export function normalizeName(raw: string): string {
  const trimmed = raw?.trim() ?? '';
  if (!trimmed) return '';
  return trimmed.replace(/\u00a0/g, ' ').replace(/\s+/g, ' ');
}

/** "New England Patriots" -> "new-england-patriots" */
export function toTeamId(displayName: string): string {
  return normalizeName(displayName).toLowerCase().replace(/ /g, '-');
}

export function foldText(raw: string): string {
  return normalizeName(raw)
    .replace(/[\u2018\u2019\u02bc`\u00b4]/g, "'")
    .replace(/[\u201c\u201d]/g, '"')
    .toLowerCase();
}
