import { BundleState } from '@fletes/shared';

export const BUNDLE_METADATA_SK = 'METADATA';
export const LINE_SK_PREFIX = 'LINE#';
export const AUDIT_SK_PREFIX = 'AUDIT#';

export const bundlePk = (vehicleConsecutive: string) => `BUNDLE#${vehicleConsecutive}`;
export const lineSk = (lineId: string) => `${LINE_SK_PREFIX}${lineId}`;
export const auditSk = (changedAt: string, auditId: string) => `${AUDIT_SK_PREFIX}${changedAt}#${auditId}`;

// GSI1: bundles by state, sorted by region then id
export const stateGsiPk = (state: BundleState) => `STATE#${state}`;
export const stateGsiSk = (region: string, vehicleConsecutive: string) => `${region}#${vehicleConsecutive}`;

// GSI2: lines by integra consecutive
export const integraGsiPk = (integraConsecutive: string) => `CI#${integraConsecutive}`;
export const integraGsiSk = (vehicleConsecutive: string, lineId: string) => `${vehicleConsecutive}#${lineId}`;
