export {
  ALL_PERMISSIONS,
  InvalidPermissionError,
  isPermission,
  parsePermissionList,
  parsePermissions,
  type Permission,
  sortPermissions,
} from "./permission.js"
