export interface Client {
  nit: string;
  name: string;
  costCenterCode?: string;
  location?: string;
  address?: string;
  phone?: string;
  email?: string;
  paymentMethod?: string;
}
