export { Board } from "./board";
export { loadBoard, loadBoardFile, parseBoardLayout } from "./layout-parser";
export * from "./types";
