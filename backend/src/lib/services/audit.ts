import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ulid } from 'ulid';
import {
  AuditSinkType,
  type AuditEntry,
  type RemovalOutcome,
  type RemovalRequest,
} from '@follower-relay/shared';
import { putItem } from '../dynamodb.js';
import { logger as rootLogger, type Logger } from '../logger.js';

export interface AuditSink {
  readonly name: AuditSinkType;
  write(entry: AuditEntry): Promise<void>;
}

/**
 * JSON-lines file. Writes go through one promise chain so that entries from
 * concurrent requests land whole and in call order.
 */
export class FileAuditSink implements AuditSink {
  readonly name = AuditSinkType.FILE;
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  write(entry: AuditEntry): Promise<void> {
    const line = `${JSON.stringify(entry)}\n`;
    const write = this.tail.then(() => this.appendLine(line));
    // The failure is reported through `write`; the chain itself keeps going
    this.tail = write.catch(() => undefined);
    return write;
  }

  private async appendLine(line: string): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, line, 'utf-8');
  }
}

export class DynamoAuditSink implements AuditSink {
  readonly name = AuditSinkType.DYNAMODB;

  constructor(private readonly table: string) {}

  async write(entry: AuditEntry): Promise<void> {
    const yearMonth = entry.timestamp.substring(0, 7); // YYYY-MM

    await putItem({
      TableName: this.table,
      Item: {
        PK: `AUDIT#${yearMonth}`,
        SK: `LOG#${entry.logId}`,
        GSI1PK: `ACTOR#${entry.actingUserId}`,
        GSI1SK: `LOG#${entry.timestamp}#${entry.logId}`,
        ...entry,
      },
      // Append-only
      ConditionExpression: 'attribute_not_exists(PK)',
    });
  }
}

export function createAuditSink(settings: {
  sink: AuditSinkType;
  filePath: string;
  table: string;
}): AuditSink {
  return settings.sink === AuditSinkType.DYNAMODB
    ? new DynamoAuditSink(settings.table)
    : new FileAuditSink(settings.filePath);
}

export function buildAuditEntry(
  request: RemovalRequest,
  outcome: RemovalOutcome,
  requestId?: string
): AuditEntry {
  return {
    logId: ulid(),
    timestamp: new Date().toISOString(),
    actingUserId: request.actingUserId,
    targetFollowerId: request.targetFollowerId,
    succeeded: outcome.succeeded,
    ...(outcome.errorKind && { errorKind: outcome.errorKind }),
    ...(requestId && { requestId }),
  };
}

export class AuditLog {
  constructor(
    private readonly sink: AuditSink,
    private readonly logger: Logger = rootLogger
  ) {}

  /**
   * Never rejects. A failed write is reported at error level and the
   * removal outcome it describes stands as it is.
   */
  async append(entry: AuditEntry): Promise<void> {
    try {
      await this.sink.write(entry);
    } catch (error) {
      this.logger.error(
        {
          err: error,
          sink: this.sink.name,
          logId: entry.logId,
          actingUserId: entry.actingUserId,
          targetFollowerId: entry.targetFollowerId,
          succeeded: entry.succeeded,
        },
        'Audit write failed'
      );
    }
  }
}
