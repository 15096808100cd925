import { DispatchConfigService } from '@app/common/config/config.service';
import { UpstreamUnavailableException } from '@app/common/exceptions/dispatch.exception';
import { HttpService } from '@nestjs/axios';
import { Injectable, Logger } from '@nestjs/common';
import { firstValueFrom, timeout } from 'rxjs';
import { Coordinates, DistanceMatrixResponse, GeocodeResponse, RouteDistance } from './maps.types';

const METERS_PER_KM = 1000;

@Injectable()
export class MapsService {
  private readonly logger = new Logger(MapsService.name);

  constructor(
    private readonly httpService: HttpService,
    private readonly config: DispatchConfigService,
  ) {}

  async calculateDistance(origin: Coordinates, destination: Coordinates): Promise<RouteDistance> {
    const data = await this.get<DistanceMatrixResponse>('distancematrix/json', {
      origins: this.formatPoint(origin),
      destinations: this.formatPoint(destination),
    });

    if (data.status !== 'OK') {
      this.logger.error(`Distance matrix returned ${data.status}: ${data.error_message ?? 'no details'}`);
      throw new UpstreamUnavailableException('Pricing provider rejected the request');
    }

    const element = data.rows?.[0]?.elements[0];
    if (!element || element.status !== 'OK' || !element.distance || !element.duration) {
      throw new UpstreamUnavailableException('Could not calculate distance');
    }

    return {
      distanceMeters: element.distance.value,
      durationSeconds: element.duration.value,
      distanceText: element.distance.text,
      durationText: element.duration.text,
    };
  }

  /**
   * price = base + km * perKm, rounded to the nearest minor unit.
   * Taxi 10 km at 500000 + 500000/km gives 5500000.
   */
  async estimatePrice(
    origin: Coordinates,
    destination: Coordinates,
    basePriceMinor: number,
    pricePerKmMinor: number,
  ): Promise<number> {
    const route = await this.calculateDistance(origin, destination);
    const distanceKm = route.distanceMeters / METERS_PER_KM;
    return Math.round(basePriceMinor + distanceKm * pricePerKmMinor);
  }

  // Best effort, null when the provider has no answer
  async reverseGeocode(point: Coordinates): Promise<string | null> {
    try {
      const data = await this.get<GeocodeResponse>('geocode/json', { latlng: this.formatPoint(point) });
      const first = data.results?.[0];
      return data.status === 'OK' && first ? first.formatted_address : null;
    } catch (error) {
      this.logger.warn(`Reverse geocoding failed for ${this.formatPoint(point)}: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return null;
    }
  }

  private async get<T>(path: string, params: Record<string, string>): Promise<T> {
    const url = `${this.config.mapsBaseUrl}/${path}`;
    try {
      const response = await firstValueFrom(
        this.httpService
          .get<T>(url, { params: { ...params, key: this.config.mapsApiKey } })
          .pipe(timeout(this.config.pricingTimeoutMs)),
      );
      return response.data;
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        this.logger.error(`Maps request ${path} timed out after ${this.config.pricingTimeoutMs}ms`);
      } else {
        this.logger.error(`Maps request ${path} failed:`, error);
      }
      throw new UpstreamUnavailableException('Pricing provider is unavailable');
    }
  }

  private formatPoint(point: Coordinates): string {
    return `${point.latitude},${point.longitude}`;
  }
}
