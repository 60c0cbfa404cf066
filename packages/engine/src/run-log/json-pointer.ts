import type { PatchOperation } from "@runstream/types";
import { isPlainRecord } from "../addable/addable";
import { PatchPathError } from "../errors";

export type RunStateRecord = Record<string, unknown>;

type Container = unknown[] | Record<string, unknown>;

export type ContainerEdit = (container: Container, token: string) => void;

export function parsePointer(path: string): string[] {
  if (path === "") {
    return [];
  }
  if (!path.startsWith("/")) {
    throw new PatchPathError(path, "pointer must start with \"/\"");
  }
  return path
    .slice(1)
    .split("/")
    .map((token) => token.replace(/~1/g, "/").replace(/~0/g, "~"));
}

function parseArrayIndex(token: string, path: string): number {
  if (!/^(0|[1-9][0-9]*)$/.test(token)) {
    throw new PatchPathError(path, `"${token}" is not an array index`);
  }
  return Number(token);
}

function copyContainer(node: unknown, token: string, path: string): Container {
  // Missing containers are created on the way: a list when appended to,
  // otherwise a mapping.
  if (node === undefined || node === null) {
    return token === "-" ? [] : {};
  }
  if (Array.isArray(node)) {
    return [ ...node ];
  }
  if (isPlainRecord(node)) {
    return { ...node };
  }
  throw new PatchPathError(path, `cannot descend into a ${typeof node} value`);
}

function readChild(container: Container, token: string, path: string): unknown {
  if (Array.isArray(container)) {
    return container[parseArrayIndex(token, path)];
  }
  return container[token];
}

function writeChild(container: Container, token: string, value: unknown, path: string): void {
  if (Array.isArray(container)) {
    container[parseArrayIndex(token, path)] = value;
    return;
  }
  container[token] = value;
}

function editAt(
  node: unknown,
  tokens: readonly string[],
  depth: number,
  path: string,
  edit: ContainerEdit
): Container {
  const token = tokens[depth];
  const copy = copyContainer(node, token, path);
  if (depth === tokens.length - 1) {
    edit(copy, token);
    return copy;
  }
  const child = readChild(copy, token, path);
  writeChild(copy, token, editAt(child, tokens, depth + 1, path, edit), path);
  return copy;
}

/**
 * Copy-on-write edit of the container that holds the last token of
 * `tokens`. Only the containers along the path are copied; everything else
 * is shared with `document`.
 */
export function editContainer(
  document: RunStateRecord,
  tokens: readonly string[],
  edit: ContainerEdit,
  path = tokens.map((token) => `/${token}`).join("")
): RunStateRecord {
  if (tokens.length === 0) {
    throw new PatchPathError(path, "the document root has no parent container");
  }
  const next = editAt(document, tokens, 0, path, edit);
  if (Array.isArray(next)) {
    throw new PatchPathError(path, "the document root must be a mapping");
  }
  return next;
}

export function applyOperation(
  document: RunStateRecord,
  operation: PatchOperation
): RunStateRecord {
  const { path, value } = operation;
  const kind = operation.op ?? "add";
  const tokens = parsePointer(path);

  if (tokens.length === 0) {
    if (!isPlainRecord(value)) {
      throw new PatchPathError(path, "the document root must be a mapping");
    }
    return { ...value };
  }

  return editContainer(
    document,
    tokens,
    (container, token) => {
      if (!Array.isArray(container)) {
        container[token] = value;
        return;
      }
      if (token === "-") {
        container.push(value);
        return;
      }
      const index = parseArrayIndex(token, path);
      if (kind === "add") {
        if (index > container.length) {
          throw new PatchPathError(path, `index ${index} is out of range`);
        }
        container.splice(index, 0, value);
        return;
      }
      if (index >= container.length) {
        throw new PatchPathError(path, `index ${index} is out of range`);
      }
      container[index] = value;
    },
    path
  );
}

export function applyOperations(
  document: RunStateRecord,
  operations: readonly PatchOperation[]
): RunStateRecord {
  return operations.reduce(applyOperation, document);
}
