import type { MusicItem } from "./types";

export function normalizeLink(link: string | null | undefined): string {
  return String(link ?? "").trim();
}

/** Same track means same row id and same trimmed link; a re-linked row is a new target. */
export function sameMusic(a: MusicItem | null, b: MusicItem | null): boolean {
  if (a === null && b === null) {
    return true;
  }
  if (a === null || b === null) {
    return false;
  }
  return a.id === b.id && normalizeLink(a.link) === normalizeLink(b.link);
}

export function isPlayable(music: MusicItem | null): music is MusicItem {
  return music !== null && music.id > 0 && normalizeLink(music.link) !== "";
}
