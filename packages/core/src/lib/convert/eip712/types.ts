import type { Hex } from "viem";
import type { Eip712Field } from "../../abi/types";
import type { TrustedNameSource, TrustedNameType } from "../trusted-names";

export type LegacyEip712Format = "raw" | "amount" | "datetime" | "trusted-name" | "calldata";

export interface LegacyEip712MapperField {
  /** Path relative to the message root, or `@.to` for the verifying contract. */
  path: string;
  label: string;
  format?: LegacyEip712Format;
  /** Token of an amount; absent means the verifying contract. */
  assetPath?: string;
  nameTypes?: TrustedNameType[];
  nameSources?: TrustedNameSource[];
  calleePath?: string;
  chainIdPath?: string;
  selectorPath?: string;
  amountPath?: string;
  spenderPath?: string;
}

export interface LegacyEip712Message {
  schema: Record<string, Eip712Field[]>;
  mapper: {
    label: string;
    fields: LegacyEip712MapperField[];
  };
}

export interface LegacyEip712Contract {
  address: Hex;
  contractName: string;
  messages: LegacyEip712Message[];
}

export interface LegacyEip712Descriptor {
  blockchainName: string;
  chainId: number;
  name: string;
  contracts: LegacyEip712Contract[];
}
