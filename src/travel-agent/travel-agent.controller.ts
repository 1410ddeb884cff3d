import { All, Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import {
  TravelAgentResponseDto,
  parseTravelAgentRequest,
} from './dto/travel-agent-request.dto';
import { MethodError } from './errors/travel-agent.errors';
import { TravelAgentService } from './travel-agent.service';

@Controller('travelAgent')
export class TravelAgentController {
  constructor(private readonly travelAgentService: TravelAgentService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async travelAgent(@Body() body: unknown): Promise<TravelAgentResponseDto> {
    const query = parseTravelAgentRequest(body);
    const result = await this.travelAgentService.run(query);
    return { result };
  }

  // Must stay below the POST handler: routes match in declaration order.
  @All()
  rejectMethod(): never {
    throw new MethodError();
  }
}
