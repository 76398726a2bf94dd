import path from "node:path"

const app = "stratum"

export function dataDir() {
  return process.env.STRATUM_DATA_DIR?.trim() || path.join(process.cwd(), `.${app}`)
}

export const Path = {
  get data() {
    return dataDir()
  },
  get log() {
    return process.env.STRATUM_LOG_DIR?.trim() || path.join(dataDir(), "log")
  },
}

export const Global = {
  Path,
}
