#!/usr/bin/env node

/**
 * Simulator CLI
 *
 * Play seeded rounds against the decision engine from the command line.
 */

import { runSimulation } from "./runner.js"
import { runBatch } from "./batch.js"
import { allProfiles, getProfileById } from "./profiles.js"
import type { EngineProfile, MoveRecord, RunResult } from "./types.js"
import { loadEngineConfig } from "../config.js"
import { formatPosition } from "../types.js"

export interface CliArgs {
  seed: string | undefined
  seeds: string[] | undefined
  seedCount: number | undefined
  profile: string
  maxTicks: number
  configPath: string | undefined
  batch: boolean
  verbose: boolean
  logMoves: boolean
  help: boolean
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliArgs {
  const parsed: CliArgs = {
    seed: undefined,
    seeds: undefined,
    seedCount: undefined,
    profile: "default",
    maxTicks: 10000,
    configPath: undefined,
    batch: false,
    verbose: false,
    logMoves: false,
    help: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const next = (): string => args[++i] ?? ""

    if (arg === "--help" || arg === "-h") {
      parsed.help = true
    } else if (arg === "--seed" || arg === "-s") {
      parsed.seed = next()
    } else if (arg === "--seeds") {
      parsed.seeds = next()
        .split(",")
        .filter((s) => s.length > 0)
    } else if (arg === "--seed-count" || arg === "-n") {
      parsed.seedCount = parseInt(next(), 10)
    } else if (arg === "--profile" || arg === "-p") {
      parsed.profile = next()
    } else if (arg === "--max-ticks" || arg === "-t") {
      parsed.maxTicks = parseInt(next(), 10)
    } else if (arg === "--config" || arg === "-c") {
      parsed.configPath = next()
    } else if (arg === "--batch" || arg === "-b") {
      parsed.batch = true
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true
    } else if (arg === "--log-moves") {
      parsed.logMoves = true
    }
  }

  return parsed
}

/**
 * Print usage information
 */
function printHelp(): void {
  console.log(`
Simulator CLI - Play seeded rounds against the decision engine

USAGE:
  npx ts-node src/simulator/cli.ts [options]

OPTIONS:
  -s, --seed <seed>       Single seed for a reproducible run
  --seeds <s1,s2,...>     Comma-separated list of seeds for batch
  -n, --seed-count <n>    Generate N seeds for batch (default: 20)
  -p, --profile <name>    Profile: ${allProfiles.map((p) => p.id).join(", ")}, all (default: default)
  -t, --max-ticks <n>     Maximum ticks per round (default: 10000)
  -c, --config <path>     Engine config JSON used as the base for each profile
  -b, --batch             Run batch mode (multiple seeds)
  -v, --verbose           Show engine log lines
  --log-moves             Stream every move (single run only)
  -h, --help              Show this help message

EXAMPLES:
  # Single run with a specific seed
  npx ts-node src/simulator/cli.ts --seed test-1

  # Compare every profile over 50 seeds
  npx ts-node src/simulator/cli.ts --batch --seed-count 50 --profile all
`)
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  return `${(ms / 60000).toFixed(1)}m`
}

/**
 * Format one tick of the move log
 */
export function formatMoveRecord(record: MoveRecord): string {
  const events: string[] = []
  if (record.step.collected.length > 0) events.push(`collected ${record.step.collected.join(",")}`)
  if (record.step.deposited > 0) events.push(`deposited ${record.step.deposited}`)
  if (record.step.triggered) events.push(`hazard ${record.step.triggered}`)
  const target = record.targetId ?? "-"
  const suffix = events.length > 0 ? `\t${events.join("; ")}` : ""
  return `${record.tick}\t${record.move.padEnd(13)}\t${record.status.padEnd(8)}\t${formatPosition(record.position)}\t${target}\t${record.score}${suffix}`
}

/**
 * Apply a config file on top of each profile's own config.
 */
function withConfigFile(profiles: EngineProfile[], configPath: string | undefined): EngineProfile[] {
  if (!configPath) return profiles
  const fileConfig = loadEngineConfig(configPath)
  return profiles.map((profile) => ({
    ...profile,
    config: {
      ...fileConfig,
      ...profile.config,
      weights: { ...fileConfig.weights, ...profile.config.weights },
    },
  }))
}

function resolveProfiles(name: string): EngineProfile[] | null {
  if (name === "all") return allProfiles
  const profile = getProfileById(name)
  return profile ? [profile] : null
}

/**
 * Print single run result
 */
function printResult(result: RunResult): void {
  console.log()
  console.log("=".repeat(60))
  console.log("RUN RESULT")
  console.log("=".repeat(60))
  console.log()
  console.log(`Seed: ${result.seed}`)
  console.log(`Profile: ${result.profileId}`)
  console.log(`Termination: ${result.terminationReason}`)
  console.log(`Total Ticks: ${result.totalTicks}`)
  console.log(`Score: ${result.score}`)
  console.log(`Items Collected: ${result.itemsCollected}`)
  console.log(`Deposits: ${result.deposits}`)
  console.log(`Hazards Triggered: ${result.hazardsTriggered}`)
  console.log()

  console.log("Moves:")
  for (const [move, count] of Object.entries(result.movesByType)) {
    if (count > 0) console.log(`  ${move}: ${count}`)
  }
  console.log()

  console.log("Tick Status:")
  for (const [status, count] of Object.entries(result.ticksByStatus)) {
    if (count > 0) console.log(`  ${status}: ${count}`)
  }
}

/**
 * Run a single simulation
 */
function runSingle(args: CliArgs, seed: string, profile: EngineProfile): void {
  console.log("=".repeat(60))
  console.log("SIMULATOR - Single Run")
  console.log("=".repeat(60))
  console.log()
  console.log(`Seed: ${seed}`)
  console.log(`Profile: ${profile.id}`)
  console.log(`Max Ticks: ${args.maxTicks}`)
  console.log()

  if (args.logMoves) {
    console.log("Tick\tMove\t\tStatus\t\tPosition\tTarget\tScore")
    console.log("-".repeat(80))
  }

  const startTime = Date.now()
  const result = runSimulation({
    seed,
    profile,
    maxTicks: args.maxTicks,
    logger: args.verbose ? { info: console.log, warn: console.warn } : undefined,
    onMove: args.logMoves ? (record) => console.log(formatMoveRecord(record)) : undefined,
  })
  const elapsed = Date.now() - startTime

  printResult(result)
  console.log()
  console.log(`Completed in ${formatDuration(elapsed)}`)
}

/**
 * Run batch simulations
 */
function runBatchMode(args: CliArgs, profiles: EngineProfile[]): void {
  const seedCount = args.seedCount ?? (args.seeds ? undefined : 20)

  console.log("=".repeat(60))
  console.log("SIMULATOR - Batch Mode")
  console.log("=".repeat(60))
  console.log()
  console.log(`Profiles: ${profiles.map((p) => p.id).join(", ")}`)
  console.log(`Seeds: ${args.seeds ? args.seeds.length : seedCount}`)
  console.log(`Max Ticks: ${args.maxTicks}`)
  console.log()

  const startTime = Date.now()
  process.stdout.write("Running simulations")

  const result = runBatch({
    seeds: args.seeds,
    seedCount,
    profiles,
    maxTicks: args.maxTicks,
    onProgress: () => process.stdout.write("."),
  })

  const elapsed = Date.now() - startTime

  console.log()
  console.log("=".repeat(60))
  console.log("BATCH RESULTS")
  console.log("=".repeat(60))
  console.log()
  console.log(`Total Runs: ${result.results.length}`)
  console.log(`Completed in ${formatDuration(elapsed)}`)
  console.log()

  for (const agg of Object.values(result.aggregates.byProfile)) {
    console.log(`Profile: ${agg.profileId}`)
    console.log(`  Runs: ${agg.runCount}`)
    console.log(`  Score (p10/p50/p90): ${agg.score.p10} / ${agg.score.p50} / ${agg.score.p90}`)
    console.log(`  Avg Score: ${agg.avgScore.toFixed(2)}`)
    console.log(`  Avg Score/Tick: ${agg.avgScorePerTick.toFixed(4)}`)
    if (agg.degradedTicks > 0) console.log(`  Degraded Ticks: ${agg.degradedTicks}`)
    if (agg.fallbackTicks > 0) console.log(`  Fallback Ticks: ${agg.fallbackTicks}`)
    console.log()
  }

  if (profiles.length > 1) {
    console.log("=".repeat(60))
    console.log("PROFILE COMPARISON (by median score)")
    console.log("=".repeat(60))
    console.log()

    const sorted = Object.values(result.aggregates.byProfile).sort(
      (a, b) => b.score.p50 - a.score.p50
    )
    sorted.forEach((agg, i) => {
      console.log(`${i + 1}. ${agg.profileId}: ${agg.score.p50} (avg ${agg.avgScore.toFixed(2)})`)
    })
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs()

  if (args.help) {
    printHelp()
    return
  }

  const named = resolveProfiles(args.profile)
  if (!named) {
    console.error(`Unknown profile: ${args.profile}`)
    console.error(`Available profiles: ${allProfiles.map((p) => p.id).join(", ")}, all`)
    process.exit(1)
  }
  const profiles = withConfigFile(named, args.configPath)

  if (args.batch || args.seeds || args.seedCount) {
    runBatchMode(args, profiles)
  } else if (args.seed) {
    if (profiles.length !== 1) {
      console.error("Error: --profile all is only available in batch mode")
      process.exit(1)
    }
    runSingle(args, args.seed, profiles[0])
  } else {
    console.error("Error: --seed is required for single run, or use --batch for batch mode")
    console.error("Use --help for usage information")
    process.exit(1)
  }
}

// Run only when executed directly (not when imported for testing)
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("Fatal error:", error)
    process.exit(1)
  })
}
