export { MemoryContentTypeRepository } from './MemoryContentTypeRepository';
export { MemoryContentRepository } from './MemoryContentRepository';
export { MemoryLocaleRepository } from './MemoryLocaleRepository';
export { MemoryEnvironmentRepository } from './MemoryEnvironmentRepository';
export { MemoryBlockDefinitionService } from './MemoryBlockDefinitionService';
