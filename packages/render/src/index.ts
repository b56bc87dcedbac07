/**
 * @layerkit/render
 *
 * Screen/image coordinate mapping and the software frame compositor.
 *
 * @packageDocumentation
 */

// Viewport mapping
export { ViewportTransform, computeFitZoom } from './viewport';

// Compositor
export { renderFrame, DEFAULT_BACKGROUND, CROP_DIM_ALPHA } from './compositor';
export type { FrameInput, RenderedFrame } from './compositor';
