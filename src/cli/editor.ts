/**
 * External processes: the $EDITOR round trip and the file picker
 * Both hand the terminal to a child process and can be cancelled through an
 * AbortSignal; scratch files are removed whatever happens.
 */

import { spawn as nodeSpawn, SpawnOptions } from 'child_process'
import { promises as fsp } from 'fs'
import * as os from 'os'
import * as path from 'path'
import type { Readable } from 'stream'
import { ExternalProcessError, errorMessage } from '@/helpers/errors'
import { createLogger } from '@/helpers/logger'

const logger = createLogger('editor')

// ==================== Process Plumbing ====================

export interface ChildLike {
  stdout: Readable | null
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
  on(event: 'error', listener: (error: Error) => void): unknown
  kill(signal?: NodeJS.Signals): boolean
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildLike

const defaultSpawn: SpawnFn = (command, args, options) => nodeSpawn(command, args, options)

export interface ProcessOptions {
  signal?: AbortSignal
  spawn?: SpawnFn
}

/**
 * Run a command to completion, collecting stdout when it is piped
 */
export function runProcess(
  command: string,
  args: string[],
  spawnOptions: SpawnOptions,
  options: ProcessOptions = {}
): Promise<{ stdout: string }> {
  const { signal } = options
  if (signal?.aborted) {
    return Promise.reject(new ExternalProcessError(`${command} cancelled`))
  }

  return new Promise((resolve, reject) => {
    let child: ChildLike
    try {
      child = (options.spawn ?? defaultSpawn)(command, args, spawnOptions)
    } catch (error) {
      reject(new ExternalProcessError(`Cannot start ${command}: ${errorMessage(error)}`, null, { cause: error }))
      return
    }

    let stdout = ''
    child.stdout?.setEncoding('utf8')
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk
    })

    let settled = false
    const onAbort = () => {
      child.kill('SIGTERM')
      finish(new ExternalProcessError(`${command} cancelled`))
    }
    const finish = (error: ExternalProcessError | null) => {
      if (settled) return
      settled = true
      signal?.removeEventListener('abort', onAbort)
      if (error) reject(error)
      else resolve({ stdout })
    }

    signal?.addEventListener('abort', onAbort, { once: true })
    child.on('error', (error) => {
      finish(new ExternalProcessError(`Cannot start ${command}: ${error.message}`, null, { cause: error }))
    })
    child.on('exit', (code, exitSignal) => {
      if (code === 0) finish(null)
      else finish(new ExternalProcessError(`${command} exited with ${code ?? exitSignal ?? 'unknown status'}`, code))
    })
  })
}

/**
 * Split "code --wait" into a command and its arguments
 */
export function splitCommand(commandLine: string): { command: string; args: string[] } {
  const [command = '', ...args] = commandLine.trim().split(/\s+/)
  return { command, args }
}

// ==================== Editor ====================

export interface EditorOptions extends ProcessOptions {
  editor: string
  clearVim?: boolean
  tmpRoot?: string
}

/**
 * Extra arguments for vi-family editors
 */
export function editorArgs(command: string, emptyBody: boolean, clearVim: boolean): string[] {
  const name = path.basename(command)
  if (name !== 'vi' && name !== 'vim' && name !== 'nvim') return []

  const args: string[] = []
  if (emptyBody && !clearVim) {
    args.push('+star', '-c', 'imap <C-M> <esc>:wq<enter>')
  }
  args.push('-c', 'set wrap linebreak nolist')
  return args
}

/**
 * Open `initial` in the user's editor and return what they saved.
 * Returns null when the result is blank.
 */
export async function editText(initial: string, options: EditorOptions): Promise<string | null> {
  const dir = await fsp.mkdtemp(path.join(options.tmpRoot ?? os.tmpdir(), 'murmur-'))
  const file = path.join(dir, 'message.md')

  try {
    await fsp.writeFile(file, initial, 'utf8')
    const { command, args } = splitCommand(options.editor)
    await runProcess(
      command,
      [...args, ...editorArgs(command, initial === '', options.clearVim ?? false), file],
      { stdio: 'inherit', env: { ...process.env, TERM: 'xterm1' } },
      options
    )
    const text = await fsp.readFile(file, 'utf8')
    return text.trim() === '' ? null : text.trimEnd()
  } finally {
    await fsp.rm(dir, { recursive: true, force: true }).catch((error) => {
      logger.warn(`Could not remove ${dir}: ${errorMessage(error)}`)
    })
  }
}

// ==================== File Picker ====================

/**
 * Run the picker command through the shell; each stdout line is a path.
 * An empty result means the user cancelled.
 */
export async function pickFiles(commandLine: string, options: ProcessOptions = {}): Promise<string[]> {
  if (!commandLine.trim()) {
    throw new ExternalProcessError('No file picker configured (set MURMUR_FILE_PICKER)')
  }

  const { stdout } = await runProcess(
    commandLine,
    [],
    { shell: true, stdio: ['inherit', 'pipe', 'inherit'] },
    options
  )
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}
