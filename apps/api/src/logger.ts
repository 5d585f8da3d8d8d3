import { Cause, HashMap, Layer, List, Logger, LogLevel } from 'effect'

function formatMessage(message: unknown): string {
  if (!Array.isArray(message)) return String(message)
  return message.map(String).join(' ')
}

/**
 * One JSON object per record: `level`, `ts`, `msg`, then the log annotations
 * (e.g. `requestId`, `version`). Open log spans appear under `spans` as label to
 * elapsed milliseconds; a failure cause is rendered under `cause`.
 */
export function makeJsonLogger(write: (line: string) => void) {
  return Logger.make(({ logLevel, message, date, annotations, spans, cause }) => {
    const entry: Record<string, unknown> = {
      level: logLevel.label.toLowerCase(),
      ts: date.toISOString(),
      msg: formatMessage(message),
    }

    for (const [key, value] of HashMap.toEntries(annotations)) {
      entry[key] = value
    }

    if (!List.isNil(spans)) {
      const now = date.getTime()
      entry['spans'] = Object.fromEntries(
        List.toArray(spans).map((span) => [span.label, now - span.startTime]),
      )
    }

    if (!Cause.isEmpty(cause)) {
      entry['cause'] = Cause.pretty(cause)
    }

    write(JSON.stringify(entry))
  })
}

/** Replaces the default logger with the JSON one, writing through `write`. Info and above only. */
export function jsonLoggerLayer(write: (line: string) => void) {
  return Logger.replace(Logger.defaultLogger, makeJsonLogger(write)).pipe(
    Layer.merge(Logger.minimumLogLevel(LogLevel.Info)),
  )
}

export const JsonLoggerLive = jsonLoggerLayer((line) => {
  process.stdout.write(line + '\n')
})
