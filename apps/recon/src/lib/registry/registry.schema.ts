import { z } from 'zod';
import { CHANNELS } from '@channel-recon/catalog';

/**
 * Shape of the SKU mapping file (config/sku-mapping.json).
 *
 * `mappings` is keyed by channel, then by the channel's own identifier.
 * Channel keys are checked against the channel list when the registry is
 * built so every problem can be reported at once.
 */
export const skuMappingSchema = z.object({
  masterSkus: z.array(z.string().trim().min(1, 'Master SKU cannot be blank')).min(1, 'At least one master SKU is required'),
  channelOrder: z.array(z.enum(CHANNELS)).min(1, 'At least one channel is required'),
  mappings: z
    .record(z.string(), z.record(z.string(), z.string().trim().min(1, 'Mapping target cannot be blank')))
    .default({}),
});

export type SkuMappingDefinition = z.infer<typeof skuMappingSchema>;
export type SkuMappingInput = z.input<typeof skuMappingSchema>;
