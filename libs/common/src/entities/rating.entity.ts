export interface Rating {
  id: string;
  orderId: string;
  customerId: string;
  driverId: string;
  score: number;
  comment: string | null;
  createdAt: Date;
}
