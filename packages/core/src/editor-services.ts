/**
 * @module editor-services
 * Wires the shared bus and the managers that hang off it.
 */

import type { EventBus, Logger } from '@layerkit/types';
import { EventBusImpl } from './event-bus';
import { LayerManager } from './layer-manager';
import { consoleLogger } from './logger';
import { resolveEditorOptions } from './options';
import type { EditorOptions } from './options';
import { ToolManager } from './tool-manager';
import { ViewportManager } from './viewport-manager';

/** The managers every editor component shares. */
export interface EditorServices {
  readonly options: EditorOptions;
  readonly bus: EventBus;
  readonly layers: LayerManager;
  readonly viewport: ViewportManager;
  readonly tools: ToolManager;
  readonly logger: Logger;
}

export interface EditorServiceOverrides {
  bus?: EventBus;
  logger?: Logger;
}

/**
 * Create the editor services.
 * @throws RangeError if the options carry invalid zoom bounds.
 */
export function createEditorServices(
  options: Partial<EditorOptions> = {},
  overrides: EditorServiceOverrides = {},
): EditorServices {
  const resolved = resolveEditorOptions(options);
  const bus = overrides.bus ?? new EventBusImpl();
  return {
    options: resolved,
    bus,
    layers: new LayerManager(bus),
    viewport: new ViewportManager(bus, resolved),
    tools: new ToolManager(bus),
    logger: overrides.logger ?? consoleLogger('Editor'),
  };
}
