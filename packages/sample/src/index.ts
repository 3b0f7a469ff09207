// @seismolink/sample

export * from "./axis_triple";
export * from "./sample";
