/**
 * How a follower opens its connection to the authority.
 */

import { connect } from "net";
import type { Duplex } from "stream";
import { TransportError } from "../errors.js";

/** Opens a fresh connected stream, or rejects with a TransportError */
export type Connector = () => Promise<Duplex>;

export function tcpConnector(host: string, port: number): Connector {
  return () =>
    new Promise((resolve, reject) => {
      const socket = connect({ host, port });
      const onError = (error: Error) => {
        socket.destroy();
        reject(new TransportError(`Could not connect to ${host}:${port}: ${error.message}`, { cause: error }));
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        socket.setNoDelay(true);
        resolve(socket);
      });
    });
}
