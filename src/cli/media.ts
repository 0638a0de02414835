/**
 * Opening links and media with the desktop's handler, and saving downloads
 */

import { promises as fsp } from 'fs'
import * as os from 'os'
import * as path from 'path'
import { runProcess, ProcessOptions } from './editor'

// ==================== Opening ====================

/**
 * The platform's "open this with whatever handles it" command
 */
export function openCommand(target: string, platform: NodeJS.Platform = os.platform()): { command: string; args: string[] } {
  if (platform === 'darwin') return { command: 'open', args: [target] }
  if (platform === 'win32') return { command: 'cmd', args: ['/c', 'start', '""', target] }
  return { command: 'xdg-open', args: [target] }
}

export interface OpenOptions extends ProcessOptions {
  platform?: NodeJS.Platform
}

/**
 * Hand a URL or file path to the desktop; resolves once the opener exits
 */
export async function openTarget(target: string, options: OpenOptions = {}): Promise<void> {
  const { command, args } = openCommand(target, options.platform)
  await runProcess(command, args, { stdio: 'ignore' }, options)
}

// ==================== Saving ====================

export type ExistsFn = (file: string) => Promise<boolean>

const fileExists: ExistsFn = (file) =>
  fsp.access(file).then(
    () => true,
    () => false
  )

/**
 * First free path for `fileName` in `dir`: name.ext, name_1.ext, name_2.ext...
 */
export async function uniquePath(dir: string, fileName: string, exists: ExistsFn = fileExists): Promise<string> {
  const safeName = path.basename(fileName) || 'attachment'
  const ext = path.extname(safeName)
  const stem = path.basename(safeName, ext)

  let candidate = path.join(dir, safeName)
  for (let counter = 1; await exists(candidate); counter++) {
    candidate = path.join(dir, `${stem}_${counter}${ext}`)
  }
  return candidate
}

/**
 * Write downloaded bytes into `dir` without overwriting anything; returns the path used
 */
export async function saveDownload(dir: string, fileName: string, data: Uint8Array): Promise<string> {
  await fsp.mkdir(dir, { recursive: true })
  const target = await uniquePath(dir, fileName)
  await fsp.writeFile(target, data, { flag: 'wx' })
  return target
}
