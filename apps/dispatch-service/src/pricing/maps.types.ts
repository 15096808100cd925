export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface RouteDistance {
  distanceMeters: number;
  durationSeconds: number;
  distanceText: string;
  durationText: string;
}

interface TextValue {
  text: string;
  value: number;
}

export interface DistanceMatrixResponse {
  status: string;
  error_message?: string;
  rows?: Array<{
    elements: Array<{
      status: string;
      distance?: TextValue;
      duration?: TextValue;
    }>;
  }>;
}

export interface GeocodeResponse {
  status: string;
  results?: Array<{
    formatted_address: string;
  }>;
}
