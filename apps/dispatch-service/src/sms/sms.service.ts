import { DispatchConfigService } from '@app/common/config/config.service';
import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { firstValueFrom, timeout } from 'rxjs';

const SMS_TIMEOUT_MS = 5000;

@Injectable()
export class SmsService {
  private readonly logger = new Logger(SmsService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly config: DispatchConfigService,
  ) {}

  buildLocationLink(token: string): string {
    return `${this.config.locationLinkBaseUrl}/set-location/${token}`;
  }

  /** Never throws; false when nothing was handed to a provider. */
  async sendLocationLink(phone: string, token: string, orderId: string): Promise<boolean> {
    const message = `Please set your location for order #${orderId}: ${this.buildLocationLink(token)}`;
    return this.send(phone, message);
  }

  async send(phone: string, message: string): Promise<boolean> {
    const providerUrl = this.config.smsProviderUrl;
    if (!providerUrl) {
      this.logger.log(`[SMS disabled] To: ${phone}, Message: ${message}`);
      return false;
    }

    try {
      await firstValueFrom(
        this.httpService
          .post(
            providerUrl,
            { to: phone, from: this.config.smsSenderId, message },
            { headers: { Authorization: `Bearer ${this.config.smsApiKey}` } },
          )
          .pipe(timeout(SMS_TIMEOUT_MS)),
      );
      this.logger.log(`SMS sent to ${phone}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to send SMS to ${phone}: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return false;
    }
  }
}
