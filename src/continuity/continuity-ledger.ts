import { VoiceIdentity } from '../domain/types';
import { KeyedSequencer } from '../common/keyed-sequencer';

export const DEFAULT_HISTORY_SIZE = 3;
// ElevenLabs rejects more than three previous request ids.
export const MAX_HISTORY_SIZE = 3;

/** Fixed-capacity ring of identifiers; the oldest entry is overwritten first. */
export class BoundedHistory {
  private readonly slots: string[];
  private start = 0;
  private size = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<string>(capacity);
  }

  get length(): number {
    return this.size;
  }

  push(id: string): void {
    const end = (this.start + this.size) % this.capacity;
    this.slots[end] = id;
    if (this.size < this.capacity) {
      this.size += 1;
    } else {
      this.start = (this.start + 1) % this.capacity;
    }
  }

  /** Oldest first, most recent last. */
  toArray(): string[] {
    const items: string[] = [];
    for (let offset = 0; offset < this.size; offset += 1) {
      items.push(this.slots[(this.start + offset) % this.capacity]);
    }
    return items;
  }
}

/**
 * Per-voice trail of recent generation ids for one run. Keyed by provider voice
 * id, so speakers that share a voice share continuity.
 */
export class ContinuityLedger {
  private readonly histories = new Map<string, BoundedHistory>();
  private readonly sequencer = new KeyedSequencer<string>();

  readonly capacity: number;

  constructor(capacity = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`History capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = Math.min(capacity, MAX_HISTORY_SIZE);
  }

  historyFor(voice: VoiceIdentity): readonly string[] {
    return this.histories.get(voice.voiceId)?.toArray() ?? [];
  }

  record(voice: VoiceIdentity, generationId: string): void {
    if (!generationId) {
      return;
    }
    let history = this.histories.get(voice.voiceId);
    if (!history) {
      history = new BoundedHistory(this.capacity);
      this.histories.set(voice.voiceId, history);
    }
    history.push(generationId);
  }

  /**
   * Serializes read-generate-record cycles for one voice in submission order;
   * cycles for other voices proceed independently.
   */
  exclusive<T>(voice: VoiceIdentity, task: () => Promise<T>): Promise<T> {
    return this.sequencer.run(voice.voiceId, task);
  }
}
