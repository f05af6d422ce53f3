import { PipeTransform, Injectable, BadRequestException } from '@nestjs/common';
import { validate } from 'class-validator';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ActionType } from '@screenpilot/shared';
import {
  ClickActionDto,
  ComputerActionDto,
  DragActionDto,
  KeyComboActionDto,
  MoveActionDto,
  ScrollActionDto,
  TypeActionDto,
  WaitActionDto,
} from './computer-action.dto';

const ACTION_DTOS: Record<ActionType, ClassConstructor<ComputerActionDto>> = {
  click: ClickActionDto,
  move: MoveActionDto,
  drag: DragActionDto,
  type: TypeActionDto,
  key_combo: KeyComboActionDto,
  scroll: ScrollActionDto,
  wait: WaitActionDto,
};

function isActionName(value: unknown): value is ActionType {
  return typeof value === 'string' && Object.hasOwn(ACTION_DTOS, value);
}

/**
 * Picks the DTO class from the `action` discriminator, then validates the body
 * against it.
 */
@Injectable()
export class ComputerActionValidationPipe implements PipeTransform {
  async transform(value: unknown): Promise<ComputerActionDto> {
    if (typeof value !== 'object' || value === null || !('action' in value)) {
      throw new BadRequestException('Missing action field');
    }
    if (!isActionName(value.action)) {
      throw new BadRequestException(`Unknown action: ${String(value.action)}`);
    }

    const dto = plainToInstance(ACTION_DTOS[value.action], value);
    const errors = await validate(dto, { forbidUnknownValues: true });
    if (errors.length > 0) {
      throw new BadRequestException(
        errors.flatMap((error) => Object.values(error.constraints ?? {
          [error.property]: `${error.property} is invalid`,
        })),
      );
    }

    return dto;
  }
}
