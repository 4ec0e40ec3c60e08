export { SkuRegistry, loadSkuRegistry, normalizeIdentifier } from './sku-registry';
export { skuMappingSchema } from './registry.schema';
export type { SkuMappingDefinition, SkuMappingInput } from './registry.schema';
