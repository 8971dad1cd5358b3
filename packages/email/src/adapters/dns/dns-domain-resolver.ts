import { resolve4, resolveMx } from "node:dns/promises"
import type { DomainResolver } from "../../ports/domain-resolver"

export type DnsLookups = {
  resolveMx(domain: string): Promise<readonly unknown[]>
  resolve4(domain: string): Promise<readonly string[]>
}

export type DnsDomainResolverDeps = {
  lookups?: DnsLookups
}

const NO_RECORD_CODES = new Set(["ENOTFOUND", "ENODATA"])

/**
 * MX first, then A. A missing domain or an empty answer is `false`; other
 * resolver failures (timeouts, refused queries) reject.
 */
export class DnsDomainResolver implements DomainResolver {
  private readonly lookups: DnsLookups

  constructor(deps: DnsDomainResolverDeps = {}) {
    this.lookups = deps.lookups ?? { resolveMx, resolve4 }
  }

  async hasMxOrA(domain: string): Promise<boolean> {
    if (await hasRecords(() => this.lookups.resolveMx(domain))) return true

    return hasRecords(() => this.lookups.resolve4(domain))
  }
}

async function hasRecords(lookup: () => Promise<readonly unknown[]>): Promise<boolean> {
  try {
    return (await lookup()).length > 0
  } catch (err) {
    if (isNoRecordError(err)) return false
    throw err
  }
}

function isNoRecordError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false
  return typeof err.code === "string" && NO_RECORD_CODES.has(err.code)
}
