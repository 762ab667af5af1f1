function domain(resource: string, actions: readonly string[]): string[] {
  return [...actions, "*"].map((action) => `${resource}:${action}`);
}

export const DEFAULT_ADMIN_ROLES: readonly string[] = Object.freeze(["admin"]);

export const DEFAULT_ADMIN_PERMISSIONS: readonly string[] = Object.freeze([
  ...domain("orders", ["read", "create", "update", "delete", "cancel"]),
  ...domain("inventory", ["read", "adjust", "transfer"]),
  ...domain("returns", ["read", "create", "approve", "reject"]),
  ...domain("shipments", ["read", "create", "update", "delete"]),
  ...domain("warranties", ["read", "create", "update", "delete"]),
  ...domain("workorders", ["read", "create", "update", "delete"]),
  "admin:outbox",
  "payments:access",
  "agents:access"
]);
