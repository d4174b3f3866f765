import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { RecordLessonProgressDto } from './record-progress.dto';

async function invalidFields(payload: object): Promise<string[]> {
  const errors = await validate(plainToInstance(RecordLessonProgressDto, payload));
  return errors.map((error) => error.property).sort();
}

describe('RecordLessonProgressDto', () => {
  it('caps a single report at one day of watch time', async () => {
    await expect(invalidFields({ time_spent_minutes: 1440 })).resolves.toEqual([]);
    await expect(invalidFields({ time_spent_minutes: 1441 })).resolves.toEqual(['time_spent_minutes']);
  });

  it('rejects negative minutes and percentages above 100', async () => {
    await expect(invalidFields({ time_spent_minutes: -1, completion_percentage: 100.5 })).resolves.toEqual([
      'completion_percentage',
      'time_spent_minutes',
    ]);
  });
});
