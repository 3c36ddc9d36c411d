export { PositionRouter, targetQty } from "./PositionRouter";
export type { RouteInput, RouterSizing } from "./PositionRouter";
