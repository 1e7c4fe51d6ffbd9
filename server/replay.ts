import { writeFile } from 'node:fs/promises'
import { basename, dirname, extname, join, resolve } from 'node:path'
import { parseArgs } from 'node:util'
import { NMEASession } from '../src/session/session.js'
import { formatSummaryText, summarize } from '../src/session/summary.js'
import { createFileSink, EXPORT_EXTENSIONS, ExportError, exportSession, parseExportFormat, toNetworkLink } from '../src/export/index.js'
import type { ExportFormat } from '../src/export/index.js'
import { replayFile } from './line-source.js'

export interface ReplayOptions {
  input: string
  format?: ExportFormat
  output?: string
  networkLink: boolean
}

const USAGE = 'usage: nmea-replay -i <file> [-f csv|tsv|kml|kmz|geojson|jsonl|nmea] [-o <out>] [--network-link]'

/** Parse argv (without node and script); throws with a usage message on bad input. */
export function parseReplayArgs(argv: string[]): ReplayOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: 'string', short: 'i' },
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      'network-link': { type: 'boolean', default: false },
    },
    strict: true,
  })
  if (!values.input) throw new Error(`missing input file\n${USAGE}`)
  const format = values.format !== undefined ? parseExportFormat(values.format) : undefined
  if (values['network-link'] && format !== 'kml') {
    throw new Error(`--network-link needs -f kml\n${USAGE}`)
  }
  if (format && resolve(values.output ?? defaultOutputPath(values.input, format)) === resolve(values.input)) {
    throw new Error(`output would overwrite the input file ${values.input}\n${USAGE}`)
  }
  return { input: values.input, format, output: values.output, networkLink: values['network-link'] ?? false }
}

/**
 * Where the export goes when -o is not given: the input name with the format's
 * extension, or `<name>.export<ext>` when that would be the input itself.
 */
export function defaultOutputPath(input: string, format: ExportFormat): string {
  const ext = EXPORT_EXTENSIONS[format]
  const stem = basename(input, extname(input))
  const candidate = join(dirname(input), stem + ext)
  return resolve(candidate) === resolve(input) ? join(dirname(input), `${stem}.export${ext}`) : candidate
}

export async function runReplay(options: ReplayOptions): Promise<NMEASession> {
  const session = new NMEASession()
  session.startIngest()
  try {
    await replayFile(options.input, line => { session.processLine(line) })
  } finally {
    session.stopIngest()
  }

  console.log(formatSummaryText(summarize(session)))

  if (options.format) {
    const output = options.output ?? defaultOutputPath(options.input, options.format)
    const result = await exportSession(session, options.format, createFileSink(output))
    console.log(`[replay] Wrote ${result.items} ${options.format === 'nmea' ? 'sentences' : 'positions'} to ${output} (${result.bytes} bytes)`)

    if (options.networkLink) {
      const linkPath = join(dirname(output), 'live_' + basename(output))
      await writeFile(linkPath, toNetworkLink(basename(output)), 'utf-8')
      console.log(`[replay] Wrote network link to ${linkPath}`)
    }
  }
  return session
}

/** Runs the whole command; resolves with the process exit code. */
export async function main(argv: string[]): Promise<number> {
  let options: ReplayOptions
  try {
    options = parseReplayArgs(argv)
  } catch (e) {
    console.error(`[replay] ${e instanceof Error ? e.message : String(e)}`)
    return 2
  }

  try {
    await runReplay(options)
    return 0
  } catch (e) {
    if (e instanceof ExportError) {
      console.error(`[replay] Export failed (${e.code}): ${e.message}`)
    } else {
      console.error(`[replay] ${e instanceof Error ? e.message : String(e)}`)
    }
    return 1
  }
}
