import { z } from "zod";
import rawNetworks from "./networks.json";

const networkSchema = z.object({
  chainId: z.number().int().positive(),
  /** Network identifier used by signing devices. */
  network: z.string().min(1),
  name: z.string().min(1),
});

export type Network = z.infer<typeof networkSchema>;

export const NETWORKS: readonly Network[] = z.array(networkSchema).parse(rawNetworks);

const NETWORK_BY_CHAIN_ID = new Map(NETWORKS.map((network) => [network.chainId, network]));

export function getNetwork(chainId: number): Network | undefined {
  return NETWORK_BY_CHAIN_ID.get(chainId);
}

/** Device network identifier of a chain, `undefined` when the chain is not supported. */
export function getNetworkId(chainId: number): string | undefined {
  return getNetwork(chainId)?.network;
}
