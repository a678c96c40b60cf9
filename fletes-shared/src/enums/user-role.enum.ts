export enum UserRole {
  Admin = 'ADMIN',
  Coordinator = 'COORDINATOR',
  Control = 'CONTROL',
  Analyst = 'ANALYST',
  Dispatcher = 'DISPATCHER',
  Operator = 'OPERATOR'
}
