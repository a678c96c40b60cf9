import { UserRole } from '../enums/user-role.enum';

export enum DispatchCapability {
  IngestBatch = 'INGEST_BATCH',
  AdjustBundle = 'ADJUST_BUNDLE',
  MergeBundles = 'MERGE_BUNDLES',
  SplitBundle = 'SPLIT_BUNDLE',
  AuthorizeRequiresCoordinator = 'AUTHORIZE_REQUIRES_COORDINATOR',
  AuthorizeRequiresControl = 'AUTHORIZE_REQUIRES_CONTROL',
  ConfirmPreauthorized = 'CONFIRM_PREAUTHORIZED',
  DeleteBundle = 'DELETE_BUNDLE',
  ViewAllRegions = 'VIEW_ALL_REGIONS',
  LoadPedidoNumbers = 'LOAD_PEDIDO_NUMBERS',
  ExportAuthorized = 'EXPORT_AUTHORIZED'
}

const ALL_ROLES = Object.values(UserRole);

/**
 * Who may do what. Keep this table as the single source of truth for role
 * checks; services only ask `can(user, capability)`.
 */
export const DISPATCH_CAPABILITIES: Record<DispatchCapability, readonly UserRole[]> = {
  [DispatchCapability.IngestBatch]: [UserRole.Admin, UserRole.Dispatcher, UserRole.Operator, UserRole.Analyst],
  [DispatchCapability.AdjustBundle]: [UserRole.Admin, UserRole.Dispatcher, UserRole.Analyst, UserRole.Operator],
  [DispatchCapability.MergeBundles]: [UserRole.Admin, UserRole.Dispatcher, UserRole.Operator],
  [DispatchCapability.SplitBundle]: [UserRole.Admin, UserRole.Dispatcher, UserRole.Operator],
  [DispatchCapability.AuthorizeRequiresCoordinator]: [UserRole.Admin, UserRole.Coordinator, UserRole.Control],
  [DispatchCapability.AuthorizeRequiresControl]: [UserRole.Admin, UserRole.Control],
  [DispatchCapability.ConfirmPreauthorized]: [UserRole.Admin, UserRole.Dispatcher, UserRole.Analyst, UserRole.Operator],
  [DispatchCapability.DeleteBundle]: ALL_ROLES.filter(
    role => role !== UserRole.Coordinator && role !== UserRole.Control
  ),
  [DispatchCapability.ViewAllRegions]: [UserRole.Admin, UserRole.Coordinator, UserRole.Control, UserRole.Analyst],
  [DispatchCapability.LoadPedidoNumbers]: [UserRole.Admin, UserRole.Analyst],
  [DispatchCapability.ExportAuthorized]: [UserRole.Admin, UserRole.Analyst]
};

/** Regions operated as a single area */
export const PAIRED_REGIONS: ReadonlyArray<readonly [string, string]> = [['CELTA', 'FUNZA']];
