export interface PedidoNumberFailure {
  integraConsecutive: string;
  error: string;
}

export interface LoadPedidoNumbersResult {
  updatedLines: number;
  completedBundles: string[];
  failed: PedidoNumberFailure[];
}
