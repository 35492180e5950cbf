export { PgContentTypeRepository } from './contentTypeQueries';
export { PgContentRepository } from './contentQueries';
export { PgEnvironmentRepository } from './environmentQueries';
export { PgLocaleRepository } from './localeQueries';
export { PgBlockDefinitionService } from './blockDefinitionQueries';
export { PgActivitySink } from './activityQueries';
