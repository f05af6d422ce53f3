import { IsInt, IsNumber } from 'class-validator';
import { MouseButton } from '@screenpilot/shared';

export class CoordinatesDto {
  @IsNumber({ allowNaN: false, allowInfinity: false })
  x!: number;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  y!: number;
}

export class ScrollDeltaDto {
  @IsInt()
  x!: number;

  @IsInt()
  y!: number;
}

export const MOUSE_BUTTONS: MouseButton[] = ['left', 'right', 'middle'];
