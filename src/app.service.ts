import { Injectable } from '@nestjs/common';
import {
  SERVICE_NAME,
  SERVICE_VERSION,
} from './credibility/config/credibility.constants';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string } {
    return {
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    };
  }
}
