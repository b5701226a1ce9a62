export enum Role {
  Admin = 'Admin',
  Manager = 'Manager',
  Employee = 'Employee',
}
