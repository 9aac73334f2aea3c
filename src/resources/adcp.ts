export const PROTOCOL_OVERVIEW = `Ad Context Protocol (ADCP) v2.3.0

Task-first architecture for advertising automation:
- Media Buy Protocol: get_products, create_media_buy, get_media_buy_delivery
- Signals Activation: discover_signals, activate_signal
- Creative Protocol: sync_creatives
- Property Discovery: get_properties

Natural language queries supported across all discovery tasks.`;

export const USAGE_EXAMPLES = `ADCP Usage Examples:

1. Product Discovery:
   get_products(query="Find prime time video spots during news programs next week under 30,000 MAD")

2. Campaign Creation:
   create_media_buy(
       name="Spring Sale 2025",
       advertiser="Example Brand",
       package_ids=["ab_001", "ab_002"],
       start_date="2025-03-01",
       end_date="2025-03-31",
       budget=500000
   )

3. Audience Signals:
   discover_signals(query="Find sports enthusiasts interested in football, aged 18-35 in Morocco")

4. Creative Upload:
   sync_creatives(
       media_buy_id="mb_20250306",
       creative_urls=["https://cdn.example.com/ad1.mp4"]
   )
`;

export interface StaticResource {
  name: string;
  uri: string;
  description: string;
  text: string;
}

export const ADCP_RESOURCES: StaticResource[] = [
  {
    name: 'protocol-overview',
    uri: 'adcp://protocol',
    description: 'ADCP protocol information',
    text: PROTOCOL_OVERVIEW,
  },
  {
    name: 'usage-examples',
    uri: 'adcp://examples',
    description: 'ADCP usage examples',
    text: USAGE_EXAMPLES,
  },
];
