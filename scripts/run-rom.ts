#!/usr/bin/env tsx
/* eslint-disable no-console */
import path from 'node:path'
import { runRom } from '@core/harness/headless'
import { configFromEnv } from '@core/system/config'
import { formatHex } from '@core/errors'
import { loadRomFile } from '@utils/romfile'
import { writeFramePng } from '@utils/png'

function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

function usage(): never {
  console.error('Usage: tsx scripts/run-rom.ts <rom.ch8> [--frames=N] [--png=out.png] [--scale=N] [--keys=1,2] [--ascii]')
  process.exit(2)
}

function parseArgs() {
  const argv = process.argv.slice(2)
  let rom = getEnv('ROM') || ''
  let frames = parseInt(getEnv('FRAMES') || '600', 10)
  let png = getEnv('PNG_OUT') || ''
  let scale = 8
  let keys: number[] = []
  let ascii = false
  for (const a of argv) {
    if (a.startsWith('--frames=')) frames = parseInt(a.slice(9), 10)
    else if (a.startsWith('--png=')) png = a.slice(6)
    else if (a.startsWith('--scale=')) scale = parseInt(a.slice(8), 10)
    else if (a.startsWith('--keys=')) keys = a.slice(7).split(',').filter(Boolean).map((k) => parseInt(k, 16))
    else if (a === '--ascii') ascii = true
    else if (!a.startsWith('--')) rom = a
  }
  if (!rom) usage()
  if (!Number.isFinite(frames) || frames <= 0) frames = 600
  if (!Number.isFinite(scale) || scale <= 0) scale = 8
  return { rom, frames, png, scale, keys, ascii }
}

async function main(): Promise<void> {
  const args = parseArgs()
  const bytes = loadRomFile(args.rom)
  const config = configFromEnv(process.env)
  const res = runRom(bytes, { frames: args.frames, config, keys: args.keys })
  const regs = res.sys.registers()
  const summary = {
    rom: path.basename(args.rom),
    frames: res.frames,
    cycles: res.cycles,
    state: res.state,
    reason: res.reason,
    pc: formatHex(regs.pc, 4),
    lit: res.sys.framebuffer().reduce((n, p) => n + p, 0),
    fault: res.fault ? { kind: res.fault.kind, pc: formatHex(res.fault.pc, 4), opcode: res.fault.opcode === null ? null : formatHex(res.fault.opcode, 4), message: res.fault.message } : null,
  }
  console.log(JSON.stringify(summary))
  if (args.ascii) console.log(res.sys.screenAscii())
  if (args.png) {
    await writeFramePng(path.resolve(args.png), res.sys.framebuffer(), { scale: args.scale })
    console.log('PNG written:', path.resolve(args.png))
  }
  process.exit(res.reason === 'fault' ? 1 : 0)
}

main().catch((e) => { console.error(e instanceof Error ? e.message : e); process.exit(1) })
