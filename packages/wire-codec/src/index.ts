// @seismolink/wire-codec
// Stateless translation between datagram bytes and typed frames.

export * from "./frame_v1";
export * from "./errors";
export * from "./decode";
export * from "./encode";
