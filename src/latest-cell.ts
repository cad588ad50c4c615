/**
 * Latest-value slot shared between one writer (a watcher) and one reader
 * (the playback controller). Values are overwritten, never queued: a reader
 * that falls behind only ever sees the newest value.
 *
 * Change tracking is a version counter. `set` bumps it, `consumeChange`
 * catches the reader up and hands back the value in one step.
 */
export class LatestValueCell<T> {
  private value: T | null = null;
  private version = 0;
  private consumedVersion = 0;

  /** Stores the value and raises the change flag. */
  set(value: T): void {
    this.value = value;
    this.version += 1;
  }

  /** Stores the value without raising the change flag. */
  seed(value: T): void {
    this.value = value;
    this.consumedVersion = this.version;
  }

  get(): T | null {
    return this.value;
  }

  hasChange(): boolean {
    return this.version !== this.consumedVersion;
  }

  /** Takes and clears the change flag; null when nothing is unconsumed. */
  consumeChange(): T | null {
    if (!this.hasChange()) {
      return null;
    }
    this.consumedVersion = this.version;
    return this.value;
  }
}
