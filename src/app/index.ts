/**
 * Orchestration
 * Controllers that connect input and geometry to a window host
 */

export { TilingEngine, type TilingEngineOptions } from "./engine";
export { WindowManager, type ControllerOptions, type WindowManagerOptions } from "./windowManager";
export { GestureController, type GestureControllerOptions } from "./gestureController";
export { KeyboardTileController, type KeyboardTileControllerOptions } from "./keyboardController";
export { ZoomManager } from "./zoomManager";
export { ZoomToggleController } from "./zoomToggleController";
export { GridResizeSession } from "./gridResizeSession";
export { EdgeResizeController, type EdgeHandle, type EdgeResizeControllerOptions } from "./edgeResizeController";
export { discoverWindows, screenFrameAt } from "./discovery";
