import { formatWire } from '../common/coordinates';
import type { MountSnapshot, MountStatus } from '../common/types';

export interface HistoryEntry {
  timestamp: number;
  status: MountStatus;
  ra: string;
  dec: string;
  x: number;
  y: number;
  target?: string;
}

export class StatusHistory {
  private entries: HistoryEntry[] = [];

  constructor(private maxEntries = 300) {}

  addEntry(snapshot: MountSnapshot): void {
    this.entries.unshift({
      timestamp: snapshot.timestamp,
      status: snapshot.status,
      ra: formatWire(snapshot.ra),
      dec: formatWire(snapshot.dec),
      x: snapshot.encoders.x,
      y: snapshot.encoders.y,
      target: snapshot.target?.name
    });
    if (this.entries.length > this.maxEntries) {
      this.entries.pop();
    }
  }

  /** Newest first. */
  list(): HistoryEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.entries = [];
  }

  /** Oldest first, `;`-separated. */
  toCsv(): string {
    const header = 'timestamp_iso;status;ra;dec;x;y;target';
    const rows = this.entries
      .slice()
      .reverse()
      .map((entry) => {
        const timestamp = new Date(entry.timestamp).toISOString();
        return `${timestamp};${entry.status};${entry.ra};${entry.dec};${entry.x};${entry.y};${entry.target ?? ''}`;
      });
    return [header, ...rows].join('\n');
  }
}
