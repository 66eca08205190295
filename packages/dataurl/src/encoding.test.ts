import { MimeError } from '@mimewise/core'
import { describe, expect, test } from 'vitest'
import { decodeBase64, encodeBase64, percentDecode, percentEncode } from './encoding'

const encoder = new TextEncoder()

function decodeErrorOf(fn: () => unknown): MimeError {
	try {
		fn()
	} catch (error) {
		if (error instanceof MimeError) return error
		throw error
	}
	throw new Error('expected a MimeError')
}

describe('base64', () => {
	test('encodes with padding', () => {
		expect(encodeBase64(new Uint8Array())).toBe('')
		expect(encodeBase64(encoder.encode('Hello'))).toBe('SGVsbG8=')
		expect(encodeBase64(new Uint8Array([0, 1, 2, 3]))).toBe('AAECAw==')
	})

	test('encodes only the viewed range of a subarray', () => {
		const view = new Uint8Array([0, 1, 2, 3, 4]).subarray(1, 3)
		expect(encodeBase64(view)).toBe('AQI=')
	})

	test('decodes to a plain Uint8Array', () => {
		const bytes = decodeBase64('AAECAw==')
		expect(bytes).toEqual(new Uint8Array([0, 1, 2, 3]))
		expect(bytes.constructor).toBe(Uint8Array)
		expect(decodeBase64('')).toEqual(new Uint8Array())
	})

	test('rejects a length that is not a multiple of 4', () => {
		const error = decodeErrorOf(() => decodeBase64('SGVsbG8'))
		expect(error.code).toBe('DecodeError')
		expect(error.context).toEqual({ reason: 'base64 length is not a multiple of 4', length: 7 })
	})

	test('rejects characters outside the alphabet and misplaced padding', () => {
		expect(decodeErrorOf(() => decodeBase64('SGV$bG8=')).context.reason).toBe('illegal base64 character or padding')
		expect(decodeErrorOf(() => decodeBase64('SG=sbG8=')).code).toBe('DecodeError')
		expect(decodeErrorOf(() => decodeBase64('S===')).code).toBe('DecodeError')
		expect(decodeErrorOf(() => decodeBase64('SGVs bG8')).code).toBe('DecodeError')
	})
})

describe('percent encoding', () => {
	test('matches encodeURIComponent for UTF-8 text', () => {
		for (const text of ['Hello World', 'a,b;c=d', "it's (fine)!", 'café ☕', '100% ~done*']) {
			expect(percentEncode(encoder.encode(text))).toBe(encodeURIComponent(text))
		}
	})

	test('escapes bytes that are not UTF-8', () => {
		expect(percentEncode(new Uint8Array([0x00, 0x41, 0xff]))).toBe('%00A%FF')
	})

	test('decodes escapes and literal characters to bytes', () => {
		expect(percentDecode('Hello%20World')).toEqual(encoder.encode('Hello World'))
		expect(percentDecode('caf%C3%A9')).toEqual(encoder.encode('café'))
		expect(percentDecode('café')).toEqual(encoder.encode('café'))
		expect(percentDecode('%ff%00')).toEqual(new Uint8Array([0xff, 0x00]))
		expect(percentDecode('')).toEqual(new Uint8Array())
	})

	test('reverses percentEncode for every byte value', () => {
		const all = Uint8Array.from({ length: 256 }, (_, i) => i)
		expect(percentDecode(percentEncode(all))).toEqual(all)
	})

	test('rejects malformed escapes', () => {
		const error = decodeErrorOf(() => percentDecode('100%'))
		expect(error.code).toBe('DecodeError')
		expect(error.message).toBe('Invalid data URL payload: malformed percent escape at 3')
		expect(error.context).toEqual({ reason: 'malformed percent escape at 3', position: 3 })
		expect(decodeErrorOf(() => percentDecode('%zz')).code).toBe('DecodeError')
		expect(decodeErrorOf(() => percentDecode('%4')).code).toBe('DecodeError')
	})
})
