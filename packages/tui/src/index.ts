// Core TUI interfaces and classes

// Keybindings
export { type KeyBindings, KeybindingsManager } from "./keybindings.js";
// Keyboard input handling
export { type KeyId, matchesKey, parseKey, printableText } from "./keys.js";
// Input buffering for batch splitting
export { StdinBuffer, type StdinBufferEventMap, type StdinBufferOptions } from "./stdin-buffer.js";
// Terminal interface and implementations
export { ProcessTerminal, parseBackgroundColorReply, type RgbColor, type Terminal } from "./terminal.js";
export { type Component, Container, TUI } from "./tui.js";
// Utilities
export { charWidth, fitToWidth, stripAnsi, takeWidth, textWidth, visibleWidth } from "./utils.js";
