/**
 * SKU Mapping Registry
 *
 * Owns the master-SKU universe, the channel display order and the mapping
 * from each channel's identifiers to master SKUs. Built once per run and
 * passed read-only to every component that needs it.
 */

import { readFile } from 'fs/promises';
import {
  CHANNELS,
  getChannelLabel,
  isChannel,
  type Channel,
  type MasterSku,
} from '@channel-recon/catalog';
import { RegistryConfigError, UnmappedIdentifierError } from '../errors';
import { skuMappingSchema, type SkuMappingInput } from './registry.schema';

/**
 * Identifier matching ignores case and surrounding whitespace
 */
export function normalizeIdentifier(raw: string): string {
  return raw.trim().toUpperCase();
}

interface MappingOrigin {
  target: MasterSku;
  origin: string;
}

export class SkuRegistry {
  private constructor(
    private readonly skus: readonly MasterSku[],
    private readonly channels: readonly Channel[],
    private readonly index: ReadonlyMap<Channel, ReadonlyMap<string, MasterSku>>
  ) {}

  /**
   * Build a registry from a mapping definition.
   *
   * Every master SKU resolves to itself on every channel. An identifier must
   * resolve to the same master SKU on every channel it appears on; any
   * disagreement is a configuration error.
   *
   * @throws RegistryConfigError listing every problem found
   */
  static fromDefinition(input: SkuMappingInput): SkuRegistry {
    return SkuRegistry.fromJson(input);
  }

  /**
   * Same as fromDefinition, for values read from disk
   */
  static fromJson(input: unknown): SkuRegistry {
    const parsed = skuMappingSchema.safeParse(input);
    if (!parsed.success) {
      throw new RegistryConfigError(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'mapping'}: ${issue.message}`)
      );
    }

    const { masterSkus, channelOrder, mappings } = parsed.data;
    const problems: string[] = [];

    // Master SKU universe
    const masterByKey = new Map<string, MasterSku>();
    for (const sku of masterSkus) {
      const key = normalizeIdentifier(sku);
      if (masterByKey.has(key)) {
        problems.push(`Duplicate master SKU "${sku}"`);
        continue;
      }
      masterByKey.set(key, sku);
    }

    // Channel order
    const seenChannels = new Set<Channel>();
    for (const channel of channelOrder) {
      if (seenChannels.has(channel)) {
        problems.push(`Channel "${channel}" listed twice in channelOrder`);
      }
      seenChannels.add(channel);
    }

    // Identifier index: master codes first, then explicit mappings
    const claims = new Map<string, MappingOrigin>();
    const index = new Map<Channel, Map<string, MasterSku>>();
    for (const channel of CHANNELS) {
      index.set(channel, new Map(masterByKey));
    }
    for (const [key, sku] of masterByKey) {
      claims.set(key, { target: sku, origin: 'the master SKU list' });
    }

    for (const [channelKey, entries] of Object.entries(mappings)) {
      if (!isChannel(channelKey)) {
        problems.push(`Unknown channel "${channelKey}" in mappings`);
        continue;
      }
      const channelIndex = index.get(channelKey) ?? new Map<string, MasterSku>();
      const label = getChannelLabel(channelKey);

      for (const [identifier, rawTarget] of Object.entries(entries)) {
        const key = normalizeIdentifier(identifier);
        if (!key) {
          problems.push(`${label} has a blank identifier`);
          continue;
        }

        const target = masterByKey.get(normalizeIdentifier(rawTarget));
        if (!target) {
          problems.push(`${label} identifier "${identifier}" maps to unknown master SKU "${rawTarget}"`);
          continue;
        }

        const claim = claims.get(key);
        if (claim && claim.target !== target) {
          problems.push(
            `${label} identifier "${identifier}" maps to "${target}" but ${claim.origin} maps it to "${claim.target}"`
          );
          continue;
        }

        claims.set(key, { target, origin: claim?.origin ?? label });
        channelIndex.set(key, target);
      }
    }

    if (problems.length > 0) {
      throw new RegistryConfigError(problems);
    }

    return new SkuRegistry([...masterByKey.values()], [...seenChannels], index);
  }

  /**
   * Resolve a channel identifier to its master SKU
   *
   * @throws UnmappedIdentifierError when the channel has no entry for it
   */
  resolve(channel: Channel, identifier: string): MasterSku {
    const sku = this.index.get(channel)?.get(normalizeIdentifier(identifier));
    if (sku === undefined) {
      throw new UnmappedIdentifierError(channel, identifier.trim());
    }
    return sku;
  }

  /**
   * Master SKUs in declared order. Defines every output row.
   */
  allMasterSkus(): readonly MasterSku[] {
    return this.skus;
  }

  /**
   * Channels in display order
   */
  channelOrder(): readonly Channel[] {
    return this.channels;
  }
}

/**
 * Load the registry from a JSON mapping file
 */
export async function loadSkuRegistry(filePath: string): Promise<SkuRegistry> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new RegistryConfigError([
      `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new RegistryConfigError([
      `${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }

  return SkuRegistry.fromJson(json);
}
