#!/usr/bin/env tsx
/* eslint-disable no-console */
import { Chip8System } from '@core/system/system'
import { configFromEnv } from '@core/system/config'
import { loadRomFile } from '@utils/romfile'
import { hexdump } from '@utils/hexdump'

// Dump the 4 KiB address space after loading a ROM (optionally after running N cycles)
function parseArgs() {
  let rom = process.env.ROM || ''
  let cycles = 0
  let all = false
  for (const a of process.argv.slice(2)) {
    if (a.startsWith('--cycles=')) cycles = parseInt(a.slice(9), 10) | 0
    else if (a === '--all') all = true
    else if (!a.startsWith('--')) rom = a
  }
  if (!rom) {
    console.error('Usage: tsx scripts/dump-ram.ts <rom.ch8> [--cycles=N] [--all]')
    process.exit(2)
  }
  return { rom, cycles: Math.max(0, cycles), all }
}

(function main() {
  const args = parseArgs()
  try {
    const sys = new Chip8System(configFromEnv(process.env))
    sys.load(loadRomFile(args.rom))
    for (let i = 0; i < args.cycles && sys.state === 'running'; i++) sys.stepCycle()
    if (sys.fault) console.error(`halted: ${sys.fault.message}`)
    for (const line of hexdump(sys.dumpMemory(), { squeezeZeros: !args.all })) console.log(line)
  } catch (e) {
    console.error(e instanceof Error ? e.message : e)
    process.exit(1)
  }
})()
