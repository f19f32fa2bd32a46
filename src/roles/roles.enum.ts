export enum RoleEnum {
  admin = 1,
  person = 2,
  issuer = 3,
}
