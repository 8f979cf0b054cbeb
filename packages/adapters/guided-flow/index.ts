/**
 * Guided Flow Adapters
 *
 * Exports the bouquet builder and admin flower draft drivers.
 */

export {
  BouquetBuilder,
  type BouquetBuilderOptions,
  type GuidedFlowResult,
} from './bouquet-builder.js';
export { FlowerDraftBuilder, type FlowerDraftBuilderOptions } from './flower-draft-builder.js';
