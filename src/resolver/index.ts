export { AzureTargetResolver, createTargetResolver, type TargetResolverDeps } from "./manager.js";
