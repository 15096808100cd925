export enum OrderType {
  TAXI = 'TAXI',
  DELIVERY = 'DELIVERY',
}
