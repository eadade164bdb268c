import { EventType, IProcessingEvent } from '../../src/models/processingEvent.model';
import { EventLoggerService } from '../../src/services/eventLogger.service';

describe('EventLoggerService Unit Tests', () => {
  it('should write the event with its correlation ids', async () => {
    // Arrange
    const written: IProcessingEvent[] = [];
    const logger = new EventLoggerService(async event => written.push(event));

    // Act
    await logger.emit(EventType.SHEET_PARSE_COMPLETED, 'success', { jobId: 'job-1', sheetId: 'sheet-1', portfolioId: 'sheet-1' });

    // Assert
    expect(written).toHaveLength(1);
    expect(written[0]).toMatchObject({
      eventType: 'sheet_parse_completed',
      status: 'success',
      jobId: 'job-1',
      sheetId: 'sheet-1',
      portfolioId: 'sheet-1',
    });
    expect(written[0].timestamp).toBeInstanceOf(Date);
  });

  it('should swallow write failures', async () => {
    // Arrange
    const logger = new EventLoggerService(async () => {
      throw new Error('not primary');
    });

    // Act & Assert
    await expect(logger.emit(EventType.JOB_CREATED, 'success', { jobId: 'job-1' })).resolves.toBeUndefined();
  });
});
