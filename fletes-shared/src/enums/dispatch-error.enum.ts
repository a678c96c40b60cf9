export enum DispatchErrorKind {
  Validation = 'VALIDATION',
  Authorization = 'AUTHORIZATION',
  State = 'STATE',
  NotFound = 'NOT_FOUND',
  External = 'EXTERNAL'
}

export enum DispatchErrorCode {
  BatchRejected = 'BATCH_REJECTED',
  RequiredField = 'REQUIRED_FIELD',
  InvalidNumber = 'INVALID_NUMBER',
  InvalidTripType = 'INVALID_TRIP_TYPE',
  ClientMissing = 'CLIENT_MISSING',
  TariffMissing = 'TARIFF_MISSING',
  OtherCostsMissing = 'OTHER_COSTS_MISSING',
  DuplicateIntegraConsecutive = 'DUPLICATE_INTEGRA_CONSECUTIVE',
  DuplicateOrderConsecutive = 'DUPLICATE_ORDER_CONSECUTIVE',
  InconsistentBundle = 'INCONSISTENT_BUNDLE',
  BundleAlreadyExists = 'BUNDLE_ALREADY_EXISTS',
  UnknownRealDestination = 'UNKNOWN_REAL_DESTINATION',
  EmptyDestination = 'EMPTY_DESTINATION',
  ConflictingDestination = 'CONFLICTING_DESTINATION',
  MergeHomogeneity = 'MERGE_HOMOGENEITY',
  MergeTooFewBundles = 'MERGE_TOO_FEW_BUNDLES',
  SplitEmptyGroup = 'SPLIT_EMPTY_GROUP',
  SplitInvalidGroups = 'SPLIT_INVALID_GROUPS',
  SplitKilos = 'SPLIT_KILOS',
  AmbiguousLine = 'AMBIGUOUS_LINE',
  UserNotFound = 'USER_NOT_FOUND',
  RoleNotAllowed = 'ROLE_NOT_ALLOWED',
  RegionNotAllowed = 'REGION_NOT_ALLOWED',
  LineCompleted = 'LINE_COMPLETED',
  InvalidState = 'INVALID_STATE',
  ConcurrentModification = 'CONCURRENT_MODIFICATION',
  RequestCancelled = 'REQUEST_CANCELLED',
  BundleNotFound = 'BUNDLE_NOT_FOUND',
  LineNotFound = 'LINE_NOT_FOUND',
  StoreUnavailable = 'STORE_UNAVAILABLE',
  DirectoryUnavailable = 'DIRECTORY_UNAVAILABLE',
  ArchivalFailed = 'ARCHIVAL_FAILED',
  BundleTooLarge = 'BUNDLE_TOO_LARGE'
}
