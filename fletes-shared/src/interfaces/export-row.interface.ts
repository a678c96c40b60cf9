/** One row of the `plantilla` sheet sent to the billing system */
export interface ExportRow {
  'Tipo de viaje': string;
  'Linea de negocio': string;
  Estado: string;
  'Fecha pedido': string;
  Cliente: string;
  'Nit cliente': string;
  Origen: string;
  Destino: string;
  'Destino real': string;
  'Ubicación Cargue': string;
  'Direccion cargue': string;
  'Ubicación Descargue': string;
  'Direccion Descargue': string;
  Placa: string;
  'Tipo de vehiculo': string;
  'Consecutivo vehiculo': string;
  'Consecutivo integra': string;
  'Documentos transporte': string;
  Observación: string;
  'centro costo': string;
  Cajas: number;
  Kilos: number;
  Toneladas: number;
  'Flete unidad': number;
  'Valor unitario': number;
  'Punto adicional': number;
  'Cargue descargue': number;
  Desvio: number;
  SEGURO: number;
  'Vlr. Declar. Mercancia': number;
}

export const EXPORT_SHEET_NAME = 'plantilla';
