import type { ContainerQuery, ContainerSnapshot } from '../scraper/utils/ContainerReader.js';

export interface Viewport {
  width: number;
  height: number;
}

/**
 * The slice of a browser page the simulator and scraper drive.
 * PlaywrightPage adapts a real page; tests provide in-memory fakes.
 */
export interface PageHandle {
  url(): string;
  viewport(): Viewport;
  scrollBy(deltaY: number): Promise<void>;
  /** Current document.body.scrollHeight */
  scrollHeight(): Promise<number>;
  moveMouse(x: number, y: number, steps?: number): Promise<void>;
  readContainers(query: ContainerQuery): Promise<ContainerSnapshot>;
}
