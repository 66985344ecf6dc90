export * from "./operations/errors";
export * from "./operations/stats";
export * from "./operations/fileInfo";
export * from "./operations/extensions";
export * from "./operations/walk";
export { FileSystemManager, OPERATIONS_COMPONENT } from "./operations/manager";
export * from "./vfs/virtualFileSystem";
export { createNodeFileSystem } from "./vfs/createNodeFileSystem";
export { createVirtualFileSystem } from "./vfs/createVirtualFileSystem";
export * from "./internals/logger";
export { FsmanConfig, FsmanEnv, DEFAULT_LOG_FILE } from "./internals/config";
export { FsmanContext } from "./internals/context";
export {
  ExecutionException,
  InternalException,
} from "./internals/exceptions";
export * from "./cli";
export { FSMAN_VERSION } from "./version";
