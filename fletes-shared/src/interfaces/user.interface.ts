import { UserRole } from '../enums/user-role.enum';

export interface DispatchUser {
  username: string;
  role: UserRole;
  region: string;
  fullName?: string;
  active?: boolean;
}
