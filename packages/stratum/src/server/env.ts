import { readEnv, validatePineconeEnv } from "@/config/env"
import { ConfigurationError } from "@/error"

export const DEFAULT_PORT = 3000

export function isProduction() {
  return process.env.NODE_ENV === "production"
}

/** Shared token for the /api routes. Optional in development, required in production. */
export function resolveAPIToken() {
  const token = readEnv("STRATUM_API_TOKEN")
  if (!token && isProduction()) {
    throw new ConfigurationError("STRATUM_API_TOKEN is required in production")
  }
  return token
}

export function resolvePort() {
  const raw = readEnv("PORT")
  if (!raw) return DEFAULT_PORT
  const port = Number(raw)
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 1 and 65535, got: ${raw}`)
  }
  return port
}

export function validateServerEnv() {
  resolveAPIToken()
  resolvePort()
  validatePineconeEnv()
}
