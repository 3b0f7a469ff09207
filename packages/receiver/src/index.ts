// @seismolink/receiver
// UDP receiver and time compensator for measurement datagrams.

export * from "./receiver";
export * from "./measurement_stream";
export * from "./clock_anchor";
export * from "./ordering_filter";
export * from "./datagram_queue";
export * from "./datagram_socket";
export * from "./errors";
export * from "./logger";
export * from "./config";
