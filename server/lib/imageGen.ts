import { GoogleGenAI } from '@google/genai'
import fs from 'node:fs/promises'
import path from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import type { ImageGenOptions, ImageGenResult } from './mediaTypes.js'
import { MediaGenError } from './mediaTypes.js'

const clients = new Map<string, GoogleGenAI>()

function getGenAI(apiKey: string | undefined): GoogleGenAI {
  if (!apiKey) throw new MediaGenError('imageGen', 'GEMINI_API_KEY is not set')
  let client = clients.get(apiKey)
  if (!client) {
    client = new GoogleGenAI({ apiKey })
    clients.set(apiKey, client)
  }
  return client
}

function isImageMimeType(value: string | undefined): value is ImageGenResult['mimeType'] {
  return value === 'image/png' || value === 'image/jpeg'
}

/**
 * generateSceneImage: text-to-image via Gemini image model.
 * Returns base64 image + timing. Throws MediaGenError on failure.
 */
export async function generateSceneImage(
  prompt: string,
  options: ImageGenOptions = {},
): Promise<ImageGenResult> {
  const { apiKey, model = 'gemini-2.5-flash-image' } = options
  const genAI = getGenAI(apiKey)
  const start = Date.now()

  const response = await genAI.models.generateContent({
    model,
    contents: prompt,
    config: { responseModalities: ['IMAGE'] },
  })

  const imagePart = response.candidates?.[0]?.content?.parts?.find(
    (p) => p.inlineData?.mimeType?.startsWith('image/'),
  )
  const data = imagePart?.inlineData?.data
  const mimeType = imagePart?.inlineData?.mimeType
  if (!data || !isImageMimeType(mimeType)) {
    throw new MediaGenError('imageGen', 'No image data in response')
  }

  return { base64: data, mimeType, durationMs: Date.now() - start }
}

/**
 * Writes an image under `<outputDir>/<folder>/` and returns the public URL
 * the static route serves it from.
 */
export async function saveGeneratedImage(
  image: ImageGenResult,
  outputDir: string,
  folder: string,
): Promise<string> {
  const ext = image.mimeType === 'image/jpeg' ? 'jpg' : 'png'
  const fileName = `${uuidv4()}.${ext}`
  const dir = path.join(outputDir, folder)
  await fs.mkdir(dir, { recursive: true })
  await fs.writeFile(path.join(dir, fileName), Buffer.from(image.base64, 'base64'))
  return `/generated/${folder}/${fileName}`
}
