import dgram, { type RemoteInfo } from "node:dgram";
import type { AddressInfo } from "node:net";

export type { RemoteInfo };

export type SocketFamily = "udp4" | "udp6";

/**
 * The part of dgram.Socket the receiver relies on.
 * Tests substitute an in-process implementation.
 */
export interface DatagramSocket {
  bind(port: number, address: string): unknown;
  close(callback?: () => void): unknown;
  address(): AddressInfo;
  on(event: "message", listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  once(event: "listening", listener: () => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
  removeListener(event: "error", listener: (err: Error) => void): unknown;
}

export type CreateSocket = (family: SocketFamily) => DatagramSocket;

export const createUdpSocket: CreateSocket = (family) => dgram.createSocket(family);
