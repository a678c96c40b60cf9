// Enums
export * from './enums/bundle-state.enum';
export * from './enums/user-role.enum';
export * from './enums/trip-type.enum';
export * from './enums/dispatch-error.enum';

// Interfaces
export * from './interfaces/line.interface';
export * from './interfaces/bundle.interface';
export * from './interfaces/tariff.interface';
export * from './interfaces/user.interface';
export * from './interfaces/client.interface';
export * from './interfaces/dispatch-error.interface';
export * from './interfaces/access-policy.interface';
export * from './interfaces/workflow-rules.interface';
export * from './interfaces/audit.interface';
export * from './interfaces/ingest.interface';
export * from './interfaces/export-row.interface';
export * from './interfaces/completion.interface';

// DTOs
export * from './dtos/ingest.dto';
export * from './dtos/bundle-operations.dto';
export * from './dtos/authorization.dto';
export * from './dtos/completion.dto';
export * from './dtos/bundle-filters.dto';

// Utils
export * from './utils/money.util';
export * from './utils/city-key.util';
export * from './utils/consecutive.util';
export * from './utils/vehicle-class.util';
export * from './utils/warehouse.util';
export * from './utils/pricing-kernel.util';
export * from './utils/projection.util';
