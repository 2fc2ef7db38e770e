/**
 * @file index.ts
 * @description Public API: the headless core plus the terminal front end.
 */

export type * from './types.js';
export * from './constants.js';
export * from './geometry.js';
export * from './physics.js';
export * from './score.js';
export * from './ai.js';
export { Match, type MatchOptions } from './match.js';
export
{
  TutorialStateMachine, advanceCondition, dialogueFor, isPausedStage, nextStage,
  type TutorialProgress,
} from './tutorial.js';
export { Surface, type DrawCommand } from './surface.js';
export { Renderer, assertScoreSides, layoutScores, textWidth, type ScoreLayout } from './renderer.js';
export { SceneManager, type SceneContext } from './scenes/sceneManager.js';
export { MenuScene, type MenuAction, type MenuButton } from './scenes/menu.js';
export { GameScene } from './scenes/game.js';
export { TutorialScene } from './scenes/tutorial.js';
export { App, MUSIC_TRACK, toLogical, type AppOptions } from './app.js';
export { InvariantViolation, ConfigError } from './errors.js';
export { loadConfig, type AppConfig, type LogLevel } from './config.js';
export { createLogger, type LoggerHandle } from './logger.js';
export { BitmapGlyphSheet, loadFontFile, parseFont, type FontFile } from './glyphs.js';
export { InputManager, HOLD_TICKS } from './input.js';
export { TerminalDisplay, rasterize, CELL_SIZE } from './terminal.js';
export { AudioManager } from './audio.js';
