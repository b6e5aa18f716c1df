import { describe, it, expect } from 'vitest'
import {
  IMAGE_TOO_LARGE,
  INVALID_IMAGE,
  detectImageType,
  parseDataUri,
  parseImageBytes,
} from '@application/images/parseImage.ts'
import { MAX_IMAGE_BYTES } from '@domain/constants/limits.ts'

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01])
const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00])
const GIF = Buffer.from('GIF89a-rest', 'latin1')
const WEBP = Buffer.concat([Buffer.from('RIFF', 'latin1'), Buffer.alloc(4), Buffer.from('WEBPVP8 ', 'latin1')])

describe('detectImageType', () => {
  it.each([
    ['png', PNG],
    ['jpg', JPEG],
    ['gif', GIF],
    ['webp', WEBP],
  ])('recognises %s from its leading bytes', (extension, data) => {
    expect(detectImageType(data)).toBe(extension)
  })

  it('returns null for anything else', () => {
    expect(detectImageType(Buffer.from('plain text'))).toBeNull()
    expect(detectImageType(Buffer.alloc(0))).toBeNull()
  })
})

describe('parseImageBytes', () => {
  it('rejects files over the size limit', () => {
    const big = Buffer.concat([PNG, Buffer.alloc(MAX_IMAGE_BYTES)])

    expect(parseImageBytes(big)).toEqual({ ok: false, error: IMAGE_TOO_LARGE })
  })

  it('rejects unknown formats', () => {
    expect(parseImageBytes(Buffer.from('<svg/>'))).toEqual({ ok: false, error: INVALID_IMAGE })
  })
})

describe('parseDataUri', () => {
  it('decodes a base64 payload and ignores the declared type', () => {
    const result = parseDataUri(`data:image/jpeg;base64,${PNG.toString('base64')}`)

    expect(result).toEqual({ ok: true, image: { data: PNG, extension: 'png' } })
  })

  it('rejects strings that are not image data URIs', () => {
    expect(parseDataUri('https://example.com/cat.png')).toEqual({ ok: false, error: INVALID_IMAGE })
    expect(parseDataUri(`data:text/plain;base64,${PNG.toString('base64')}`)).toEqual({
      ok: false,
      error: INVALID_IMAGE,
    })
  })

  it('rejects a well-formed URI whose bytes are not an image', () => {
    const payload = Buffer.from('not an image').toString('base64')

    expect(parseDataUri(`data:image/png;base64,${payload}`)).toEqual({ ok: false, error: INVALID_IMAGE })
  })
})
