import { Injectable } from '@nestjs/common';
import { stringify } from 'csv-stringify/sync';
import { Interval } from '../../domain/types/interval.type';

@Injectable()
export class SelectionCsvWriter {
  write(selected: readonly Interval[]): string {
    return stringify(
      selected.map((interval) => ({
        start: interval.start,
        end: interval.end,
        cost: interval.cost,
      })),
      {
        header: true,
        columns: ['start', 'end', 'cost'],
      },
    );
  }
}
