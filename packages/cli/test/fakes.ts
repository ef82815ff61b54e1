/**
 * In-memory adapters for driving the CLI commands end to end without
 * touching the system. Backups and the run log still go to a temp home.
 */

import { mkdtempSync, mkdirSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { stripVTControlCharacters } from 'node:util'
import {
  UnitState,
  type Collaborators,
  type CommandResult,
  type CommandRunner,
  type PackageManager,
  type Rebuilder,
  type ServiceManager,
  type SystemFs,
  type UdevControl,
  type UnitActiveState,
} from '@tuneup/core'
import type { RuntimeOverrides } from '../src/runtime.js'

const ok = (command: string): CommandResult => ({ command, exitCode: 0, output: '' })

export class MemoryFs implements SystemFs {
  readonly files = new Map<string, string>()

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [path, content] of Object.entries(initial)) this.files.set(path, content)
  }

  read(path: string): Promise<Uint8Array | null> {
    const content = this.files.get(path)
    return Promise.resolve(content === undefined ? null : new TextEncoder().encode(content))
  }

  list(path: string): Promise<ReadonlyArray<string> | null> {
    const prefix = `${path}/`
    const names = [...this.files.keys()]
      .filter((p) => p.startsWith(prefix))
      .map((p) => p.slice(prefix.length).split('/')[0] ?? '')
    return Promise.resolve(names.length === 0 ? null : [...new Set(names)].sort())
  }

  exists(path: string): Promise<boolean> {
    return Promise.resolve(this.files.has(path))
  }

  write(path: string, content: Uint8Array): Promise<void> {
    this.files.set(path, new TextDecoder().decode(content))
    return Promise.resolve()
  }
}

export class FakeServices implements ServiceManager {
  readonly states = new Map<string, UnitState>()
  readonly active = new Map<string, UnitActiveState>()

  enablementState(unit: string): Promise<UnitState> {
    return Promise.resolve(this.states.get(unit) ?? UnitState.NotFound)
  }

  activeState(unit: string): Promise<UnitActiveState> {
    return Promise.resolve(this.active.get(unit) ?? 'inactive')
  }

  mask(units: ReadonlyArray<string>): Promise<CommandResult> {
    for (const u of units) this.states.set(u, UnitState.Masked)
    return Promise.resolve(ok(`systemctl mask ${units.join(' ')}`))
  }

  enable(units: ReadonlyArray<string>): Promise<CommandResult> {
    for (const u of units) {
      this.states.set(u, UnitState.Enabled)
      this.active.set(u, 'active')
    }
    return Promise.resolve(ok(`systemctl enable ${units.join(' ')}`))
  }
}

export class FakePackages implements PackageManager {
  readonly installed: Set<string>

  constructor(installed: ReadonlyArray<string> = []) {
    this.installed = new Set(installed)
  }

  isInstalled(name: string): Promise<boolean | null> {
    return Promise.resolve(this.installed.has(name))
  }

  install(names: ReadonlyArray<string>): Promise<CommandResult> {
    for (const n of names) this.installed.add(n)
    return Promise.resolve(ok(`pacman -S --needed --noconfirm ${names.join(' ')}`))
  }

  remove(names: ReadonlyArray<string>): Promise<CommandResult> {
    for (const n of names) this.installed.delete(n)
    return Promise.resolve(ok(`pacman -Rns --noconfirm ${names.join(' ')}`))
  }
}

const rebuilder = (name: string, command: string): Rebuilder => ({
  name,
  rebuild: () => Promise.resolve(ok(command)),
})

const udev: UdevControl = {
  reloadRules: () => Promise.resolve(ok('udevadm control --reload-rules')),
  trigger: () => Promise.resolve(ok('udevadm trigger')),
}

/** No external tools: every command is "not found". */
export const absentRunner: CommandRunner = {
  run: (command, args) => Promise.resolve({ command: [command, ...args].join(' '), exitCode: 127, output: '' }),
}

export interface World {
  readonly home: string
  readonly fs: MemoryFs
  readonly services: FakeServices
  readonly packages: FakePackages
  readonly lines: string[]
  readonly overrides: RuntimeOverrides
  /** Captured output with colors removed. */
  output(): string[]
}

export function world(files: Readonly<Record<string, string>> = {}): World {
  const home = mkdtempSync(join(tmpdir(), 'tuneup-cli-home-'))
  const fs = new MemoryFs(files)
  const services = new FakeServices()
  const packages = new FakePackages()
  const lines: string[] = []
  const collaborators: Collaborators = {
    packages,
    services,
    initramfs: rebuilder('mkinitcpio', 'mkinitcpio -P'),
    bootloader: rebuilder('sdboot-manage', 'sdboot-manage gen'),
    udev,
  }
  return {
    home,
    fs,
    services,
    packages,
    lines,
    overrides: {
      env: {},
      runId: '20260301T120000Z',
      clock: () => '2026-03-01T12:00:00.000Z',
      write: (line) => lines.push(line),
      runner: absentRunner,
      fs,
      collaborators,
    },
    output: () => lines.map((l) => stripVTControlCharacters(l)),
  }
}

/** Write a catalog directory and return its path. */
export function catalogDir(doc: unknown, files: Readonly<Record<string, string>> = {}): string {
  const dir = mkdtempSync(join(tmpdir(), 'tuneup-cli-catalog-'))
  writeFileSync(join(dir, 'catalog.json'), JSON.stringify(doc))
  for (const [name, content] of Object.entries(files)) {
    const path = join(dir, 'files', name)
    mkdirSync(join(path, '..'), { recursive: true })
    writeFileSync(path, content)
  }
  return dir
}
