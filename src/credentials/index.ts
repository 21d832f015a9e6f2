export {
  AzureCredentialsManager,
  createCredentialsManager,
  AZURE_MANAGEMENT_SCOPE,
  type CredentialsManagerOptions,
  type CredentialResolutionResult,
} from "./manager.js";
