import { Effect } from "effect"
import { mkdirSync, writeFileSync } from "node:fs"
import { fileURLToPath } from "node:url"
import { compare } from "../src/Comparison.js"
import { fromRecords } from "../src/Dataset.js"
import { ExecutionEngine } from "../src/ExecutionEngine.js"
import { toRows } from "../src/ResultsTable.js"

const week = Array.from({ length: 7 }, (_, day) => ({
  timestamp: Date.UTC(2021, 6, day + 1),
  temperature: 24 + Math.sin(day),
  tmax: 31 + Math.sin(day),
  tmin: 17 + Math.sin(day),
  relative_humidity: 55 + 3 * day,
  wind_speed: 2 + 0.2 * day,
  net_radiation: 16 - 0.5 * day,
  lai: 3,
  co2: 410,
  soil_moisture: 0.35,
  latitude: 45,
  doy: 182 + day,
}))

const outDir = fileURLToPath(new URL("./out/", import.meta.url))

const program = Effect.gen(function* () {
  const dataset = yield* fromRecords(week)
  const report = yield* compare(dataset)

  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))
  yield* Effect.sync(() =>
    writeFileSync(`${outDir}comparison.json`, JSON.stringify({ rows: toRows(report.table), ...report }, null, 2), "utf-8")
  )
  yield* Effect.logInfo(`wrote ${report.table.entries.length} formula column(s) to ${outDir}`)
}).pipe(Effect.provide(ExecutionEngine.Default))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run the comparison example", error)
  process.exitCode = 1
})
