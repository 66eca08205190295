import { describe, expect, test } from 'vitest'
import { MediaType, MimeError, createMimeResolver, formatDataUrl } from '../src'

const encoder = new TextEncoder()

const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x11, 0x45, 0x14, 0x19, 0x19, 0x81, 0x0])

function errorOf(fn: () => unknown): MimeError {
	try {
		fn()
	} catch (error) {
		if (error instanceof MimeError) return error
		throw error
	}
	throw new Error('expected a MimeError')
}

describe('createMimeResolver', () => {
	const resolver = createMimeResolver()

	test('resolves through every capability', () => {
		expect(resolver.fromExtension('docx').subtype).toBe('vnd.openxmlformats-officedocument.wordprocessingml.document')
		expect(resolver.fromExtensionLight('.PNG').essence).toBe('image/png')
		expect(resolver.fromPath('report/final.pdf').essence).toBe('application/pdf')
		expect(resolver.fromPathLight('index.html').essence).toBe('text/html')
		expect(resolver.fromContent(png).essence).toBe('image/png')
		expect(resolver.fromString('text/plain; charset=utf-8').parameter('charset')).toBe('utf-8')
	})

	test('lists enabled tables light first', () => {
		expect(resolver.extensionTables.map((table) => table.name)).toEqual(['light', 'full'])
	})

	test('prefers the light table for paths', () => {
		expect(resolver.resolvePath('src/main.ts').essence).toBe('audio/vnd.dlna.mpeg-tts')
		expect(resolver.resolvePath('letter.docx').subtype).toBe(
			'vnd.openxmlformats-officedocument.wordprocessingml.document'
		)
	})

	test('reports the path when no table knows it', () => {
		const error = errorOf(() => resolver.resolvePath('archive.zzz'))
		expect(error.code).toBe('UnknownExtension')
		expect(error.context).toEqual({ path: 'archive.zzz', extension: 'zzz', table: 'light' })
		expect(errorOf(() => resolver.resolvePath('Makefile')).code).toBe('UnknownExtension')
	})

	test('guesses from extension and content', () => {
		expect(resolver.fromExtensionAndContent('json', encoder.encode('{}')).essence).toBe('application/json')
		expect(resolver.fromExtensionAndContent(undefined, png).essence).toBe('image/png')
		expect(resolver.fromExtensionAndContent('zzz', encoder.encode('words')).essence).toBe('text/plain')
	})

	test('classifies media types', () => {
		expect(resolver.isTexture(MediaType.parse('image/png'))).toBe(true)
		expect(resolver.isTexture(MediaType.parse('image/svg+xml'))).toBe(false)
		expect(resolver.isTextual(MediaType.parse('application/json'))).toBe(true)
		expect(resolver.isTextual(MediaType.parse('text/plain'), new Uint8Array([0xff]))).toBe(false)
	})

	test('encodes and decodes data URLs', () => {
		const url = resolver.createDataUrl(encoder.encode('hi'), MediaType.parse('text/plain'))
		expect(formatDataUrl(url)).toBe('data:text/plain,hi')
		expect(resolver.parseDataUrl('data:image/png;base64,iVBORw0KGgoRRRQZGYEA').data).toEqual(png)
	})
})

describe('disabled capabilities', () => {
	const resolver = createMimeResolver({
		extension: false,
		extensionLight: false,
		magic: false,
		texture: false,
		dataurl: false,
	})

	test('throw FeatureDisabled', () => {
		const error = errorOf(() => resolver.fromExtension('png'))
		expect(error.code).toBe('FeatureDisabled')
		expect(error.message).toBe('Feature "extension" is not enabled')
		expect(error.context).toEqual({ feature: 'extension' })
		expect(errorOf(() => resolver.fromPathLight('a.png')).context).toEqual({ feature: 'extension-light' })
		expect(errorOf(() => resolver.fromContent(png)).context).toEqual({ feature: 'magic' })
		expect(errorOf(() => resolver.isTexture(MediaType.parse('image/png'))).context).toEqual({ feature: 'texture' })
		expect(errorOf(() => resolver.parseDataUrl('data:,x')).context).toEqual({ feature: 'dataurl' })
		expect(errorOf(() => resolver.resolvePath('a.png')).code).toBe('FeatureDisabled')
	})

	test('keep literal parsing available', () => {
		expect(resolver.fromString('image/png').essence).toBe('image/png')
	})

	test('guessing skips them and falls back to octet-stream', () => {
		expect(resolver.extensionTables).toEqual([])
		expect(resolver.fromExtensionAndContent('png', png).essence).toBe('application/octet-stream')
		expect(resolver.fromExtensionAndContent('txt', encoder.encode('words')).essence).toBe(
			'application/octet-stream'
		)
	})

	test('only the full table resolves paths when light is off', () => {
		const full = createMimeResolver({ extensionLight: false, dataurl: false })
		expect(full.extensionTables.map((table) => table.name)).toEqual(['full'])
		expect(full.resolvePath('song.m4a').essence).toBe('audio/mp4')
		expect(createMimeResolver().resolvePath('song.m4a').essence).toBe('audio/m4a')
	})
})
