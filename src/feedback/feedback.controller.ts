import { Body, Controller, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SubmitFeedbackDto } from './dto/submit-feedback.dto';
import { FeedbackAggregatorService } from './feedback-aggregator.service';

@ApiTags('Feedback')
@Controller('feedback')
export class FeedbackController {
  constructor(private readonly aggregator: FeedbackAggregatorService) {}

  @Post()
  @ApiOperation({ summary: 'Submit a rating or correction of a model output' })
  @ApiBody({ type: SubmitFeedbackDto })
  @ApiResponse({ status: 201, description: 'Feedback recorded.' })
  @ApiResponse({ status: 400, description: 'Malformed feedback.' })
  async submitFeedback(@Body() dto: SubmitFeedbackDto) {
    return this.aggregator.submit(dto);
  }
}
