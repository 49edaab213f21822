import type { BuildFile } from './file-set.js';

export type SourceChangeSubscriber = (file: BuildFile) => void;

/**
 * Per-run record of watched source files. Each file gets at most one change
 * listener, which fans out to every subscriber registered for that name.
 */
export class WatchRegistry {
  private readonly watched = new Map<string, SourceChangeSubscriber[]>();

  subscribe(file: BuildFile, subscriber: SourceChangeSubscriber): void {
    let subscribers = this.watched.get(file.name);
    if (!subscribers) {
      const fanOut: SourceChangeSubscriber[] = [];
      file.onChange(changed => {
        for (const notify of [...fanOut]) {
          notify(changed);
        }
      });
      this.watched.set(file.name, fanOut);
      subscribers = fanOut;
    }
    subscribers.push(subscriber);
  }

  isWatching(name: string): boolean {
    return this.watched.has(name);
  }

  subscriberCount(name: string): number {
    return this.watched.get(name)?.length ?? 0;
  }
}
