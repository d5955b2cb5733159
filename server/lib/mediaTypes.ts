// Image generation
export interface ImageGenOptions {
  apiKey?: string
  model?: string
}

export interface ImageGenResult {
  base64: string
  mimeType: 'image/png' | 'image/jpeg'
  durationMs: number
}

export class MediaGenError extends Error {
  constructor(
    public readonly source: string,
    message: string,
    public readonly raw?: string,
  ) {
    super(`[${source}] ${message}`)
    this.name = 'MediaGenError'
  }
}
