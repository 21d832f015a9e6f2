export { AzureVMManager, createVMManager, isNotFoundError } from "./manager.js";
