import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { SubmitFeedbackDto } from './submit-feedback.dto';

async function invalidFields(body: Record<string, unknown>): Promise<string[]> {
  const errors = await validate(plainToInstance(SubmitFeedbackDto, body));
  return errors.map((error) => error.property);
}

describe('SubmitFeedbackDto', () => {
  it('accepts a rating of a run by its UUID', async () => {
    expect(
      await invalidFields({
        modelId: 'daily-ingest.forecast',
        runId: '3f0c8a2e-5b1d-4c6e-9a7f-1e2d3c4b5a69',
        rating: 4,
      }),
    ).toEqual([]);
  });

  it('rejects a run id that is not a UUID', async () => {
    expect(
      await invalidFields({ modelId: 'daily-ingest.forecast', runId: 'run-1', rating: 4 }),
    ).toEqual(['runId']);
  });

  it('rejects ratings outside 1 to 5', async () => {
    expect(await invalidFields({ modelId: 'daily-ingest.forecast', rating: 6 })).toEqual([
      'rating',
    ]);
  });
});
