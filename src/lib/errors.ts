/**
 * Error raised when an image fetch or a media open fails.
 * Never thrown to playlist callers: the slot turns it into an `error` status.
 */
export class PlaylistLoadError extends Error {
  constructor(
    message: string,
    public readonly type: 'image' | 'video',
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PlaylistLoadError';
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : 'Unknown error');
}
