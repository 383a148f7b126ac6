#!/usr/bin/env tsx
/**
 * overmark CLI - stamp a watermark onto a JPEG or PNG image
 */

import { existsSync, realpathSync, statSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { basename, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import {
	type ImageFormat,
	type Raster,
	DEFAULT_WATERMARK_OPTIONS,
	apply,
	countTiles,
	decodeImage,
	detectFormat,
	formatFromPath,
	getMimeType,
	loadImage,
	saveImage,
	tile,
} from 'overmark'
import { type CliOptions, HELP, VERSION, parseArgs } from './args'

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

async function showInfo(input: string): Promise<void> {
	const bytes = new Uint8Array(await readFile(input))
	const format = detectFormat(bytes)
	const image = await decodeImage(bytes)

	console.log(`\nFile: ${input}`)
	console.log(`Size: ${formatBytes(bytes.length)}`)
	if (format) {
		console.log(`MIME: ${getMimeType(format)}`)
	}
	console.log(`Dimensions: ${image.width} x ${image.height}`)
	console.log(`Pixels: ${(image.width * image.height).toLocaleString()}`)
	console.log()
}

// ─────────────────────────────────────────────────────────────────────────────
// Watermark
// ─────────────────────────────────────────────────────────────────────────────

interface Rendered {
	result: Raster
	tiles: number
}

async function render(input: string, watermark: string, options: CliOptions): Promise<Rendered> {
	const base = await loadImage(input)
	const mark = await loadImage(watermark)

	if (options.tile) {
		const spacing = options.spacing ?? 0
		return {
			result: tile(base, mark, { opacity: options.opacity ?? DEFAULT_WATERMARK_OPTIONS.opacity, spacing }),
			tiles: countTiles(base.width, base.height, mark.width, mark.height, spacing),
		}
	}

	return {
		result: apply(base, mark, {
			position: options.position,
			opacity: options.opacity,
			paddingX: options.paddingX,
			paddingY: options.paddingY,
		}),
		tiles: 1,
	}
}

async function watermarkFile(
	input: string,
	watermark: string,
	output: string,
	format: ImageFormat,
	options: CliOptions
): Promise<void> {
	const log = (message: string): void => {
		if (!options.quiet) console.log(message)
	}

	if (options.verbose) {
		log(`Source:    ${input}`)
		log(`Watermark: ${watermark}`)
		log(`Output:    ${output} (${format})`)
	}

	const { result, tiles } = await render(input, watermark, options)

	if (options.verbose && options.tile) {
		log(`Tiles:     ${tiles}`)
	}

	await saveImage(output, result, { format, quality: options.quality })

	if (options.verbose) {
		log(`Size:      ${formatBytes(statSync(output).size)}`)
	}
	log(`${basename(input)} → ${basename(output)}`)
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

export async function main(argv: string[]): Promise<number> {
	const { inputs, options } = parseArgs(argv)

	if (options.help || (inputs.length === 0 && !options.version)) {
		console.log(HELP)
		return 0
	}

	if (options.version) {
		console.log(`overmark v${VERSION}`)
		return 0
	}

	if (options.info) {
		for (const input of inputs) {
			await showInfo(resolve(input))
		}
		return 0
	}

	const [inputArg, watermarkArg, outputArg, ...rest] = inputs
	if (inputArg === undefined || watermarkArg === undefined || outputArg === undefined || rest.length > 0) {
		console.error('Error: expected <input> <watermark> <output>')
		return 1
	}

	const input = resolve(inputArg)
	const watermark = resolve(watermarkArg)
	const output = resolve(outputArg)

	for (const path of [input, watermark]) {
		if (!existsSync(path)) {
			console.error(`File not found: ${path}`)
			return 1
		}
	}

	const format = formatFromPath(output)
	if (!format) {
		console.error(`Error: unsupported output extension: ${output} (use .png, .jpg or .jpeg)`)
		return 1
	}

	if (existsSync(output) && !options.overwrite) {
		console.error(`Error: ${output} exists, use --overwrite`)
		return 1
	}

	await watermarkFile(input, watermark, output, format, options)
	return 0
}

function isEntryPoint(): boolean {
	const entry = process.argv[1]
	return entry !== undefined && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url)
}

if (isEntryPoint()) {
	main(process.argv.slice(2))
		.then((code) => {
			process.exitCode = code
		})
		.catch((err: unknown) => {
			console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
			process.exitCode = 1
		})
}
