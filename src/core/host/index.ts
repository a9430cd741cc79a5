export type { Display, OnScreenWindow, WindowHost } from "./types";
export { guardHost, primaryDisplay, primaryHeight } from "./guard";
