export { AzureSubscriptionManager, createSubscriptionManager, type AzureSubscription } from "./manager.js";
