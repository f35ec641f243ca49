import { Injectable } from '@nestjs/common';
import { getApiPrefix } from './app.bootstrap';

@Injectable()
export class AppService {
  root() {
    return {
      service: 'campus-preorder-api',
      version: getApiPrefix(),
    };
  }

  health() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
