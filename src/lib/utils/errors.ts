// src/lib/utils/errors.ts

export type AudioEngineErrorKind = "fileNotFound" | "invalidFormat" | "loadFailed";

const messageFor = (kind: AudioEngineErrorKind, detail?: string): string => {
  switch (kind) {
    case "fileNotFound":
      return "Audio file not found";
    case "invalidFormat":
      return "Audio format not supported. Please use WAV, AIFF, CAF, MP3, M4A, or AAC files.";
    case "loadFailed":
      return `Failed to load audio: ${detail ?? "unknown error"}`;
  }
};

/** Thrown by engine and decoder adapters; its message is what ends up in the toast. */
export class AudioEngineError extends Error {
  public readonly kind: AudioEngineErrorKind;

  constructor(kind: AudioEngineErrorKind, detail?: string) {
    super(messageFor(kind, detail));
    this.name = "AudioEngineError";
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "";
}
