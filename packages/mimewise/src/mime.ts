import { MediaType } from '@mimewise/core'
import type { DataUrl } from '@mimewise/dataurl'
import { loadFeatures } from './features'
import { type MimeResolver, createMimeResolver } from './resolver'

/**
 * Resolver configured from MIMEWISE_FEATURES
 */
export const defaultResolver: MimeResolver = createMimeResolver(loadFeatures())

/**
 * Media type with resolution constructors.
 * Statics use `defaultResolver`; instances keep the resolver that made them.
 */
export class Mime {
	constructor(
		readonly mediaType: MediaType,
		private readonly resolver: MimeResolver = defaultResolver
	) {}

	/** Full extension table */
	static fromExtension(extension: string): Mime {
		return new Mime(defaultResolver.fromExtension(extension))
	}

	/** Curated extension table; the cheapest lookup */
	static fromExtensionLight(extension: string): Mime {
		return new Mime(defaultResolver.fromExtensionLight(extension))
	}

	static fromPath(path: string): Mime {
		return new Mime(defaultResolver.fromPath(path))
	}

	static fromPathLight(path: string): Mime {
		return new Mime(defaultResolver.fromPathLight(path))
	}

	/** Magic-number sniffing */
	static fromContent(data: Uint8Array): Mime {
		return new Mime(defaultResolver.fromContent(data))
	}

	static fromMagic(data: Uint8Array): Mime {
		return Mime.fromContent(data)
	}

	static fromString(literal: string): Mime {
		return new Mime(defaultResolver.fromString(literal))
	}

	static fromExtensionAndContent(extension: string | undefined, data: Uint8Array): Mime {
		return new Mime(defaultResolver.fromExtensionAndContent(extension, data))
	}

	get essence(): string {
		return this.mediaType.essence
	}

	isTexture(): boolean {
		return this.resolver.isTexture(this.mediaType)
	}

	/** Textual type; with `data`, also requires valid UTF-8 */
	isTextual(data?: Uint8Array): boolean {
		return this.resolver.isTextual(this.mediaType, data)
	}

	toDataUrl(data: Uint8Array): DataUrl {
		return this.resolver.createDataUrl(data, this.mediaType)
	}

	/** Essence equality; parameters are ignored */
	equals(other: Mime | MediaType | string): boolean {
		if (other instanceof Mime) return this.mediaType.equals(other.mediaType)
		if (other instanceof MediaType) return this.mediaType.equals(other)
		const parsed = MediaType.tryParse(other)
		return parsed !== null && this.mediaType.equals(parsed)
	}

	toString(): string {
		return this.mediaType.toString()
	}
}
