import type { Position } from 'overmark'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	// Placement
	position?: Position
	opacity?: number
	paddingX?: number
	paddingY?: number

	// Tiling
	tile?: boolean
	spacing?: number

	// Output
	quality?: number
	overwrite?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean

	// Commands
	info?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	inputs: string[]
	options: CliOptions
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const VALUE_FLAGS = new Set([
	'--position',
	'-p',
	'--opacity',
	'-o',
	'--padding-x',
	'-x',
	'--padding-y',
	'-y',
	'--spacing',
	'-s',
	'--quality',
	'-q',
])

const POSITION_NAMES: Record<string, Position> = {
	center: 'center',
	'top-left': 'topLeft',
	'top-right': 'topRight',
	'bottom-left': 'bottomLeft',
	'bottom-right': 'bottomRight',
}

export const HELP = `
overmark - Stamp a watermark onto a JPEG or PNG image

USAGE:
  overmark <input> <watermark> <output>          Place the watermark once
  overmark <input> <watermark> <output> --tile   Repeat the watermark across the image
  overmark --info <file>                         Show image info

OPTIONS:
  -p, --position <name>    center, top-left, top-right, bottom-left, bottom-right
                           (default: bottom-right)
  -o, --opacity <0-1>      Watermark opacity (default: 0.5)
  -x, --padding-x <px>     Horizontal padding from the anchored edge (default: 10)
  -y, --padding-y <px>     Vertical padding from the anchored edge (default: 10)
  --tile                   Tile the watermark instead of placing it once
  -s, --spacing <px>       Gap between tiles (default: 0)
  -q, --quality <1-100>    JPEG output quality (default: 85)
  --overwrite              Overwrite an existing output file
  -v, --verbose            Verbose output
  --quiet                  Suppress output
  --help                   Show this help
  --version                Show version

The output format follows the output file extension (.png, .jpg, .jpeg).

EXAMPLES:
  overmark photo.jpg logo.png out.jpg                       # Bottom-right, 50% opacity
  overmark photo.jpg logo.png out.png -p center -o 0.3      # Centered, 30% opacity
  overmark photo.jpg logo.png out.jpg -p top-left -x 20 -y 20
  overmark photo.png logo.png out.png --tile -s 40 -o 0.2   # Tiled pattern

`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

function parseNumber(flag: string, value: string, integer: boolean): number {
	const parsed = Number(value)
	if (value.trim() === '' || Number.isNaN(parsed) || (integer && !Number.isInteger(parsed))) {
		throw new Error(`Invalid value for ${flag}: ${value}`)
	}
	return parsed
}

function parsePosition(value: string): Position {
	const position = POSITION_NAMES[value.toLowerCase()]
	if (!position) {
		throw new Error(`Unknown position: ${value} (expected ${Object.keys(POSITION_NAMES).join(', ')})`)
	}
	return position
}

/**
 * Parse command-line arguments. Throws on unknown options or bad values.
 */
export function parseArgs(args: string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]!
		const next = args[i + 1]

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (arg === '--tile') {
			options.tile = true
		} else if ((arg === '--position' || arg === '-p') && next !== undefined) {
			options.position = parsePosition(next)
			i++
		} else if ((arg === '--opacity' || arg === '-o') && next !== undefined) {
			options.opacity = parseNumber(arg, next, false)
			i++
		} else if ((arg === '--padding-x' || arg === '-x') && next !== undefined) {
			options.paddingX = parseNumber(arg, next, true)
			i++
		} else if ((arg === '--padding-y' || arg === '-y') && next !== undefined) {
			options.paddingY = parseNumber(arg, next, true)
			i++
		} else if ((arg === '--spacing' || arg === '-s') && next !== undefined) {
			options.spacing = parseNumber(arg, next, true)
			i++
		} else if ((arg === '--quality' || arg === '-q') && next !== undefined) {
			options.quality = parseNumber(arg, next, true)
			i++
		} else if (VALUE_FLAGS.has(arg)) {
			throw new Error(`Missing value for ${arg}`)
		} else if (arg.startsWith('-') && arg !== '-') {
			throw new Error(`Unknown option: ${arg}`)
		} else {
			inputs.push(arg)
		}

		i++
	}

	return { inputs, options }
}
