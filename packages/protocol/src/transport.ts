/**
 * Mesh Transport Contract
 *
 * What the protocol needs from the mesh: addressed, at-least-once,
 * unordered delivery of small byte packets. No payload-size guarantee; the
 * caller fragments to the MTU it was configured with.
 */

export type ReceiveHandler = (source: string, bytes: Uint8Array) => void;

export interface MeshTransport {
  /** This node's address on the mesh */
  readonly address: string;

  send(destination: string, bytes: Uint8Array): Promise<void>;

  /** Register an inbound handler; returns a function that removes it */
  onReceive(handler: ReceiveHandler): () => void;

  close(): Promise<void>;
}
