import { Injectable } from '@nestjs/common';

/** Source of "now"; replaced in tests to pin consecutives and stamps */
@Injectable()
export class Clock {
  now(): Date {
    return new Date();
  }

  isoNow(): string {
    return this.now().toISOString();
  }
}
