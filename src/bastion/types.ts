/**
 * Azure Bastion — Type Definitions
 */

export type BastionHost = {
  name: string;
  enableTunneling?: boolean;
};
