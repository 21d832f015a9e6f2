export {
  InventoryBuilder,
  DEFAULT_ANSIBLE_HOST,
  hostVarsFor,
  serializeInventory,
  type InventoryBuilderDeps,
} from "./builder.js";
