export class MalformedTurnError extends Error {
  constructor(public readonly lineNumber: number, public readonly line: string, reason = 'missing "SPEAKER:" prefix') {
    super(`Malformed script line ${lineNumber} (${reason}): ${truncate(line)}`);
    this.name = 'MalformedTurnError';
  }
}

export class EmptyScriptError extends Error {
  constructor() {
    super('Script contains no speaker turns');
    this.name = 'EmptyScriptError';
  }
}

function truncate(value: string, maxLength = 80): string {
  const compact = value.trim();
  return compact.length <= maxLength ? compact : `${compact.slice(0, maxLength)}…`;
}
