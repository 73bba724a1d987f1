import { FormatKind } from '../domain/types';

export class UnknownSpeakerError extends Error {
  constructor(
    public readonly speaker: string,
    public readonly format: FormatKind,
    public readonly expected: readonly string[],
    public readonly turnIndex?: number,
  ) {
    const where = turnIndex === undefined ? '' : ` (turn ${turnIndex + 1})`;
    super(
      `No voice configured for speaker "${speaker}"${where} in ${format} format; ` +
        `expected one of ${expected.join(', ')} or a voice override`,
    );
    this.name = 'UnknownSpeakerError';
  }
}
