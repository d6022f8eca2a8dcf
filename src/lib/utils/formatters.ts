// src/lib/utils/formatters.ts

/** "MM:SS.xx". Rounds to hundredths before splitting so seconds never read 60. */
export function formatTime(sec: number): string {
  if (!Number.isFinite(sec) || sec < 0) sec = 0;
  const hundredths = Math.round(sec * 100);
  const minutes = Math.floor(hundredths / 6000);
  const seconds = (hundredths % 6000) / 100;
  return `${String(minutes).padStart(2, "0")}:${seconds.toFixed(2).padStart(5, "0")}`;
}

export function formatSpeed(speed: number): string {
  return `${speed.toFixed(2)} x`;
}

export function formatPitch(semitones: number): string {
  return `${semitones.toFixed(2)} st`;
}

export function speedToastMessage(speed: number): string {
  return `Speed ${speed.toFixed(2)}`;
}

export function pitchToastMessage(semitones: number): string {
  return `Pitch ${semitones.toFixed(2)}`;
}
