/**
 * RBAC error taxonomy.
 *
 * Validation errors (bad permission names, unknown roles) propagate to
 * administrative callers. Backing store errors are caught by the resolver and
 * turned into denials; they only surface on the admin surface.
 */

export type RbacErrorCode =
  | "unknown_permission"
  | "invalid_permission_name_format"
  | "invalid_permission_set"
  | "backing_store_unavailable"
  | "not_found"
  | "role_exists";

export class RbacError extends Error {
  code: RbacErrorCode;

  constructor(message: string, code: RbacErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RbacError";
    this.code = code;
  }
}

/**
 * A well-formed permission name that is not registered in the catalog.
 */
export class UnknownPermissionError extends RbacError {
  permissionName: string;

  constructor(permissionName: string) {
    super(`Unknown permission: ${permissionName}`, "unknown_permission");
    this.name = "UnknownPermissionError";
    this.permissionName = permissionName;
  }
}

/**
 * A permission name that is not shaped "resource.action".
 */
export class InvalidPermissionNameFormatError extends RbacError {
  permissionName: string;

  constructor(permissionName: string) {
    super(
      `Invalid permission name format: "${permissionName}" (expected "resource.action")`,
      "invalid_permission_name_format"
    );
    this.name = "InvalidPermissionNameFormatError";
    this.permissionName = permissionName;
  }
}

export class InvalidPermissionSetError extends RbacError {
  invalidNames: string[];

  constructor(invalidNames: string[]) {
    super(`Invalid permissions: ${invalidNames.join(", ")}`, "invalid_permission_set");
    this.name = "InvalidPermissionSetError";
    this.invalidNames = invalidNames;
  }
}

export class BackingStoreUnavailableError extends RbacError {
  operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Backing store unavailable during ${operation}: ${reason}`, "backing_store_unavailable", {
      cause,
    });
    this.name = "BackingStoreUnavailableError";
    this.operation = operation;
  }
}

export class NotFoundError extends RbacError {
  entity: "user" | "role";
  entityId: string;

  constructor(entity: NotFoundError["entity"], entityId: string | number) {
    super(`${entity === "user" ? "User" : "Role"} ${entityId} not found`, "not_found");
    this.name = "NotFoundError";
    this.entity = entity;
    this.entityId = String(entityId);
  }
}

export class RoleAlreadyExistsError extends RbacError {
  roleName: string;

  constructor(roleName: string) {
    super(`Role '${roleName}' already exists`, "role_exists");
    this.name = "RoleAlreadyExistsError";
    this.roleName = roleName;
  }
}

export function isRbacError(error: unknown): error is RbacError {
  return error instanceof RbacError;
}
