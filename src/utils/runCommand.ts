import { execFile } from "node:child_process"
import { promisify } from "node:util"

const execFileAsync = promisify(execFile)

export interface CommandResult {
  stdout: string
  stderr: string
}

/** Runs an executable with arguments (no shell) and resolves with its output. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>

// tesseract TSV for a dense page easily exceeds the 1 MB default
const MAX_BUFFER = 64 * 1024 * 1024

export const runCommand: CommandRunner = async (command, args) => {
  const { stdout, stderr } = await execFileAsync(command, [...args], {
    encoding: "utf8",
    maxBuffer: MAX_BUFFER,
    windowsHide: true,
  })
  return { stdout, stderr }
}
