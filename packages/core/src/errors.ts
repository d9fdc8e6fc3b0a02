/**
 * Error types for navtree.
 *
 * Programmer errors (unknown keys, unconfigured roles, out-of-range indices,
 * gesture state desynchronization) are thrown as `NavTreeError`. Outcomes a
 * caller is expected to branch on are returned as result unions instead.
 */

export type NavTreeErrorCode =
  /** A key that names no node in the tree. */
  | "NAVTREE_NODE_NOT_FOUND"
  | "NAVTREE_INVALID_ARGUMENT"
  /** The tree cannot take the operation, e.g. no active stack or a key collision. */
  | "NAVTREE_INVALID_STATE"
  /** Transition call out of order. */
  | "NAVTREE_INVALID_TRANSITION"
  | "NAVTREE_INVALID_SNAPSHOT"
  | "NAVTREE_INVARIANT_VIOLATION";

export class NavTreeError extends Error {
  override readonly name = "NavTreeError";
  readonly code: NavTreeErrorCode;
  /** Key of the node the error is about, when there is one. */
  readonly nodeKey: string | null;

  constructor(code: NavTreeErrorCode, message: string, nodeKey: string | null = null) {
    super(message);
    this.code = code;
    this.nodeKey = nodeKey;
  }
}

export function isNavTreeError(err: unknown, code?: NavTreeErrorCode): err is NavTreeError {
  return err instanceof NavTreeError && (code === undefined || err.code === code);
}

export function throwNodeNotFound(key: string): never {
  throw new NavTreeError("NAVTREE_NODE_NOT_FOUND", `node with key "${key}" not found`, key);
}

export function throwInvalidArgument(detail: string): never {
  throw new NavTreeError("NAVTREE_INVALID_ARGUMENT", detail);
}

export function throwInvalidState(detail: string): never {
  throw new NavTreeError("NAVTREE_INVALID_STATE", detail);
}

export function throwKeyCollision(key: string): never {
  throw new NavTreeError(
    "NAVTREE_INVALID_STATE",
    `generated key "${key}" already exists in tree`,
    key,
  );
}
