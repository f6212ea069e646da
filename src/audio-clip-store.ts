// Voice Assistant - Audio Clip Store
// Holds synthesized speech so the browser can fetch it by URL.
//
// Privacy: clips are in-memory only, never written to disk. The store keeps at
// most `limit` clips and evicts the oldest first.

import { v4 as uuidv4 } from "uuid";
import type { AudioClip } from "./types.js";

export class AudioClipStore {
  // Map iteration order is insertion order, so the first key is the oldest clip.
  private readonly clips: Map<string, AudioClip> = new Map();
  private readonly limit: number;

  constructor(limit = 100) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Audio clip limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  put(data: Buffer, mimeType: string): AudioClip {
    const clip: AudioClip = { id: uuidv4(), data, mimeType, createdAt: new Date() };
    this.clips.set(clip.id, clip);

    while (this.clips.size > this.limit) {
      const oldest = this.clips.keys().next();
      if (oldest.done) break;
      this.clips.delete(oldest.value);
    }
    return clip;
  }

  get(id: string): AudioClip | null {
    return this.clips.get(id) ?? null;
  }

  size(): number {
    return this.clips.size;
  }
}
