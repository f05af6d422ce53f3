import { Controller, Post, Body, Logger, HttpCode } from '@nestjs/common';
import { Outcome, describeAction } from '@screenpilot/shared';
import { ComputerUseService } from './computer-use.service';
import { ComputerActionValidationPipe } from './dto/computer-action-validation.pipe';
import { ComputerActionDto } from './dto/computer-action.dto';

@Controller('computer-use')
export class ComputerUseController {
  private readonly logger = new Logger(ComputerUseController.name);

  constructor(private readonly computerUseService: ComputerUseService) {}

  @Post()
  @HttpCode(200)
  async action(
    @Body(new ComputerActionValidationPipe()) params: ComputerActionDto,
  ): Promise<Outcome> {
    this.logger.log(`Computer action request: ${describeAction(params)}`);
    return this.computerUseService.execute(params);
  }
}
