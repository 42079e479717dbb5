import { errnoCode } from "@tiercache/errors"

/**
 * Whether `pid` names a running process on this host. Signal 0 only checks;
 * `EPERM` means the process exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    const code = errnoCode(err)
    if (code === "ESRCH") return false
    if (code === "EPERM") return true
    throw err
  }
}
