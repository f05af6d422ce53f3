import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { MouseButton } from '@screenpilot/shared';
import { CoordinatesDto, MOUSE_BUTTONS, ScrollDeltaDto } from './base.dto';

/**
 * Base class for action DTOs with common validation decorator
 */
abstract class BaseActionDto {
  abstract action: string;
}

export class ClickActionDto extends BaseActionDto {
  @IsIn(['click'])
  action!: 'click';

  @ValidateNested()
  @Type(() => CoordinatesDto)
  coordinates!: CoordinatesDto;

  @IsIn(MOUSE_BUTTONS)
  button!: MouseButton;

  @IsInt()
  @Min(1)
  @Max(3)
  clickCount!: number;
}

export class MoveActionDto extends BaseActionDto {
  @IsIn(['move'])
  action!: 'move';

  @ValidateNested()
  @Type(() => CoordinatesDto)
  coordinates!: CoordinatesDto;
}

export class DragActionDto extends BaseActionDto {
  @IsIn(['drag'])
  action!: 'drag';

  @ValidateNested()
  @Type(() => CoordinatesDto)
  from!: CoordinatesDto;

  @ValidateNested()
  @Type(() => CoordinatesDto)
  to!: CoordinatesDto;

  @IsIn(MOUSE_BUTTONS)
  button!: MouseButton;
}

export class TypeActionDto extends BaseActionDto {
  @IsIn(['type'])
  action!: 'type';

  @IsString()
  text!: string;
}

export class KeyComboActionDto extends BaseActionDto {
  @IsIn(['key_combo'])
  action!: 'key_combo';

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  keys!: string[];
}

export class ScrollActionDto extends BaseActionDto {
  @IsIn(['scroll'])
  action!: 'scroll';

  @ValidateNested()
  @Type(() => CoordinatesDto)
  coordinates!: CoordinatesDto;

  @ValidateNested()
  @Type(() => ScrollDeltaDto)
  delta!: ScrollDeltaDto;
}

export class WaitActionDto extends BaseActionDto {
  @IsIn(['wait'])
  action!: 'wait';

  @IsInt()
  @Min(0)
  @Max(60_000)
  durationMs!: number;
}

export type ComputerActionDto =
  | ClickActionDto
  | MoveActionDto
  | DragActionDto
  | TypeActionDto
  | KeyComboActionDto
  | ScrollActionDto
  | WaitActionDto;
