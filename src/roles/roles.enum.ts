export enum RoleEnum {
  superAdmin = 1,
  systemAdmin = 2,
  departmentHead = 3,
  seniorExpert = 4,
  expert = 5,
  user = 6,
  viewer = 7,
}
