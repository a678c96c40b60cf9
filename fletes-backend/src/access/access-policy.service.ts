import { Injectable } from '@nestjs/common';
import {
  DISPATCH_CAPABILITIES,
  DispatchCapability,
  DispatchErrorCode,
  DispatchUser,
  PAIRED_REGIONS,
} from '@fletes/shared';
import { authorizationError } from '../common/dispatch-errors';

const CAPABILITY_LABELS: Record<DispatchCapability, string> = {
  [DispatchCapability.IngestBatch]: 'cargar pedidos',
  [DispatchCapability.AdjustBundle]: 'ajustar vehículos',
  [DispatchCapability.MergeBundles]: 'fusionar vehículos',
  [DispatchCapability.SplitBundle]: 'dividir vehículos',
  [DispatchCapability.AuthorizeRequiresCoordinator]: 'autorizar vehículos que requieren coordinador',
  [DispatchCapability.AuthorizeRequiresControl]: 'autorizar vehículos que requieren control',
  [DispatchCapability.ConfirmPreauthorized]: 'confirmar vehículos preautorizados',
  [DispatchCapability.DeleteBundle]: 'eliminar vehículos',
  [DispatchCapability.ViewAllRegions]: 'consultar todas las regionales',
  [DispatchCapability.LoadPedidoNumbers]: 'cargar números de pedido',
  [DispatchCapability.ExportAuthorized]: 'exportar vehículos autorizados',
};

/** Role and region checks, driven entirely by the shared capability table */
@Injectable()
export class AccessPolicyService {
  hasCapability(user: DispatchUser, capability: DispatchCapability): boolean {
    return DISPATCH_CAPABILITIES[capability].includes(user.role);
  }

  /** Users without a view over every region are limited to their own and its pair */
  isRegionScoped(user: DispatchUser): boolean {
    return !this.hasCapability(user, DispatchCapability.ViewAllRegions);
  }

  /** Regions a region-scoped user may act on; undefined means every region */
  operableRegions(user: DispatchUser): string[] | undefined {
    if (!this.isRegionScoped(user)) {
      return undefined;
    }
    const own = user.region.toUpperCase();
    const regions = [own];
    for (const [a, b] of PAIRED_REGIONS) {
      if (own === a) regions.push(b);
      if (own === b) regions.push(a);
    }
    return regions;
  }

  canOperateRegion(user: DispatchUser, region: string): boolean {
    const regions = this.operableRegions(user);
    return regions === undefined || regions.includes(region.toUpperCase());
  }

  can(user: DispatchUser, capability: DispatchCapability, region?: string): boolean {
    if (!this.hasCapability(user, capability)) {
      return false;
    }
    return region === undefined || this.canOperateRegion(user, region);
  }

  assert(user: DispatchUser, capability: DispatchCapability, region?: string, bundleId?: string): void {
    if (!this.hasCapability(user, capability)) {
      throw authorizationError({
        code: DispatchErrorCode.RoleNotAllowed,
        message: `El rol ${user.role} no puede ${CAPABILITY_LABELS[capability]}`,
        context: { capability, role: user.role, ...(bundleId ? { bundleId } : {}) },
        region: user.region,
      });
    }
    if (region !== undefined) {
      this.assertRegion(user, region, bundleId);
    }
  }

  assertRegion(user: DispatchUser, region: string, bundleId?: string): void {
    if (!this.canOperateRegion(user, region)) {
      throw authorizationError({
        code: DispatchErrorCode.RegionNotAllowed,
        message: `El usuario ${user.username} no puede operar sobre la regional ${region}`,
        context: { region, ...(bundleId ? { bundleId } : {}) },
        region: user.region,
      });
    }
  }
}
