import { BlockList, isIP } from 'node:net'

type AddressFamily = 'ipv4' | 'ipv6'

const IPV4_MAPPED_PREFIX = /^::ffff:(\d+\.\d+\.\d+\.\d+)$/i

/**
 * Strips the IPv4-mapped IPv6 prefix (`::ffff:10.0.0.1` → `10.0.0.1`) and
 * surrounding whitespace.
 */
export function normalizeIpAddress(ip: string): string {
  const clean = ip.trim()
  const mapped = IPV4_MAPPED_PREFIX.exec(clean)
  return mapped ? mapped[1] : clean
}

function familyOf(ip: string): AddressFamily | null {
  const version = isIP(ip)
  if (version === 4) return 'ipv4'
  if (version === 6) return 'ipv6'
  return null
}

/**
 * Caller address allow-list built from a comma-separated list of addresses
 * and CIDR ranges, e.g. `192.168.1.0/24, 10.0.0.5, fd00::/8`.
 *
 * An empty list allows every caller. Entries that are neither an address
 * nor a valid range only match a caller address that is the identical string.
 */
export class IpAllowList {
  private readonly blockList = new BlockList()
  private readonly literals = new Set<string>()
  readonly entries: readonly string[]
  readonly invalidEntries: readonly string[]

  constructor(entries: readonly string[]) {
    const invalid: string[] = []
    this.entries = entries.map((entry) => entry.trim()).filter(Boolean)

    for (const entry of this.entries) {
      if (!this.addEntry(entry)) {
        invalid.push(entry)
        this.literals.add(entry)
      }
    }
    this.invalidEntries = invalid
  }

  static parse(raw: string | undefined): IpAllowList {
    return new IpAllowList((raw ?? '').split(','))
  }

  get isEmpty(): boolean {
    return this.entries.length === 0
  }

  allows(ip: string | undefined): boolean {
    if (this.isEmpty) return true
    if (!ip) return false

    const address = normalizeIpAddress(ip)
    if (this.literals.has(address)) return true

    const family = familyOf(address)
    if (!family) return false
    return this.blockList.check(address, family)
  }

  private addEntry(entry: string): boolean {
    const [address, prefixText, ...rest] = entry.split('/')
    if (rest.length > 0) return false

    const normalized = normalizeIpAddress(address)
    const family = familyOf(normalized)
    if (!family) return false

    if (prefixText === undefined) {
      this.blockList.addAddress(normalized, family)
      return true
    }

    if (!/^\d+$/.test(prefixText)) return false
    const prefix = Number(prefixText)
    const maxPrefix = family === 'ipv4' ? 32 : 128
    if (prefix > maxPrefix) return false

    this.blockList.addSubnet(normalized, prefix, family)
    return true
  }
}
