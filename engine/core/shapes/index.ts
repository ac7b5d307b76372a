export { ShapeLocator } from './ShapeLocator.js';
export type { ChartRef, PictureRef, PlainShapeRef, ShapeRef, ShapeRefOf } from './ShapeLocator.js';
