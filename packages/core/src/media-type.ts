import { MimeError } from './errors'

/**
 * RFC 7230 token characters
 */
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/

const WHITESPACE = /[ \t]/

export type MediaTypeParameters = Readonly<Record<string, string>>

export interface EqualsOptions {
	/** Also compare parameters (order-insensitive). Off by default. */
	parameters?: boolean
}

function isToken(value: string): boolean {
	return TOKEN.test(value)
}

function parseError(input: string, reason: string): MimeError {
	return new MimeError(`Invalid media type "${input}": ${reason}`, 'ParseError', { input, reason })
}

/**
 * Parse `;name=value` pairs following the essence.
 * Quoted-string values are unquoted; bare values must be tokens.
 */
function parseParameters(input: string, source: string): Record<string, string> {
	const params = new Map<string, string>()
	let pos = 0

	while (pos < input.length) {
		while (pos < input.length && (input[pos] === ';' || WHITESPACE.test(input.charAt(pos)))) pos++
		if (pos >= input.length) break

		const eq = input.indexOf('=', pos)
		const semi = input.indexOf(';', pos)
		if (eq === -1 || (semi !== -1 && semi < eq)) {
			throw parseError(source, 'parameter without value')
		}

		const name = input.slice(pos, eq).trim().toLowerCase()
		if (!isToken(name)) throw parseError(source, `illegal parameter name "${name}"`)
		if (params.has(name)) throw parseError(source, `duplicate parameter "${name}"`)
		pos = eq + 1

		let value = ''
		if (input[pos] === '"') {
			pos++
			let closed = false
			while (pos < input.length) {
				const ch = input.charAt(pos)
				if (ch === '\\' && pos + 1 < input.length) {
					value += input.charAt(pos + 1)
					pos += 2
				} else if (ch === '"') {
					pos++
					closed = true
					break
				} else {
					value += ch
					pos++
				}
			}
			if (!closed) throw parseError(source, `unterminated quoted value for "${name}"`)
			const next = input.indexOf(';', pos)
			const rest = input.slice(pos, next === -1 ? input.length : next).trim()
			if (rest !== '') throw parseError(source, `unexpected text after quoted value of "${name}"`)
			pos = next === -1 ? input.length : next
		} else {
			const next = input.indexOf(';', pos)
			value = input.slice(pos, next === -1 ? input.length : next).trim()
			if (!isToken(value)) throw parseError(source, `illegal value for parameter "${name}"`)
			pos = next === -1 ? input.length : next
		}

		params.set(name, value)
	}

	return Object.fromEntries(params)
}

function formatValue(value: string): string {
	if (isToken(value)) return value
	return `"${value.replace(/["\\]/g, '\\$&')}"`
}

/**
 * Immutable `type/subtype[;params]` value.
 * Type, subtype and parameter names are stored lower-cased.
 */
export class MediaType {
	readonly type: string
	readonly subtype: string
	readonly parameters: MediaTypeParameters

	constructor(type: string, subtype: string, parameters: Record<string, string> = {}) {
		const source = `${type}/${subtype}`
		if (type === '') throw parseError(source, 'empty type')
		if (subtype === '') throw parseError(source, 'empty subtype')
		if (!isToken(type)) throw parseError(source, `illegal character in type "${type}"`)
		if (!isToken(subtype)) throw parseError(source, `illegal character in subtype "${subtype}"`)

		// fromEntries defines own keys, so `__proto__` stays a parameter
		const normalized = new Map<string, string>()
		for (const [name, value] of Object.entries(parameters)) {
			const key = name.toLowerCase()
			if (!isToken(key)) throw parseError(source, `illegal parameter name "${name}"`)
			normalized.set(key, value)
		}

		this.type = type.toLowerCase()
		this.subtype = subtype.toLowerCase()
		this.parameters = Object.freeze(Object.fromEntries(normalized))
		Object.freeze(this)
	}

	/**
	 * Parse a `type/subtype[;name=value]*` literal.
	 * Throws a `ParseError` MimeError on malformed input.
	 */
	static parse(input: string): MediaType {
		const text = input.trim()
		const semi = text.indexOf(';')
		const essence = (semi === -1 ? text : text.slice(0, semi)).trim()
		const slash = essence.indexOf('/')
		if (slash === -1) throw parseError(input, 'missing "/"')

		const type = essence.slice(0, slash)
		const subtype = essence.slice(slash + 1)
		const parameters = semi === -1 ? {} : parseParameters(text.slice(semi + 1), input)

		try {
			return new MediaType(type, subtype, parameters)
		} catch (error) {
			if (error instanceof MimeError) throw parseError(input, String(error.context.reason))
			throw error
		}
	}

	/**
	 * Like `parse`, but null instead of a ParseError
	 */
	static tryParse(input: string): MediaType | null {
		try {
			return MediaType.parse(input)
		} catch (error) {
			if (error instanceof MimeError && error.code === 'ParseError') return null
			throw error
		}
	}

	/** `type/subtype` without parameters */
	get essence(): string {
		return `${this.type}/${this.subtype}`
	}

	/** Structured syntax suffix, e.g. `json` for `application/ld+json` */
	get suffix(): string | undefined {
		const plus = this.subtype.lastIndexOf('+')
		return plus === -1 ? undefined : this.subtype.slice(plus + 1)
	}

	parameter(name: string): string | undefined {
		const key = name.toLowerCase()
		return Object.hasOwn(this.parameters, key) ? this.parameters[key] : undefined
	}

	equals(other: MediaType, options: EqualsOptions = {}): boolean {
		if (this.type !== other.type || this.subtype !== other.subtype) return false
		if (!options.parameters) return true

		const names = Object.keys(this.parameters)
		if (names.length !== Object.keys(other.parameters).length) return false
		return names.every((name) => other.parameter(name) === this.parameters[name])
	}

	toString(): string {
		let out = this.essence
		for (const [name, value] of Object.entries(this.parameters)) {
			out += `;${name}=${formatValue(value)}`
		}
		return out
	}
}
