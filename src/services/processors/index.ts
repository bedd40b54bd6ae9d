import { DEFAULT_PROCESSOR } from '../../lib/constants';
import { BaseProcessor } from './base';
import { ProcessorRegistry } from './registry';

export { ProcessorRegistry } from './registry';
export type { AttributeProcessor, SamlAttributes } from './registry';
export { BaseProcessor } from './base';

export function createDefaultProcessorRegistry(): ProcessorRegistry {
  return new ProcessorRegistry().register(DEFAULT_PROCESSOR, new BaseProcessor());
}
