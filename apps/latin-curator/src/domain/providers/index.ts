export { DirectoryDocumentProvider, type DirectoryProviderConfig } from "./DirectoryDocumentProvider.js";
