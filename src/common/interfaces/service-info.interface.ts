/** Body of `GET /` */
export interface ServiceInfo {
  service: string;
  description: string;
  endpoints: Record<string, string>;
  rebalanceBody: string[];         // POST /rebalance fields; `?` marks optional
}
