import { QuadrantError } from '@quadrant/core';

export class GeometryError extends QuadrantError {}

export class GeometryValidationError extends GeometryError {}
