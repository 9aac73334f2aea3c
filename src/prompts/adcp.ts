// ──────────────────────────────────────────────────────────────────────────────
// Prompt templates. MCP prompt arguments arrive as strings.
// ──────────────────────────────────────────────────────────────────────────────

export interface CampaignPlannerArgs {
  objective: string;
  target_audience: string;
  budget: string;
  duration_days: string;
}

export interface InventoryAnalyzerArgs {
  channel: string;
  date_from: string;
  date_to: string;
}

export function campaignPlannerPrompt(args: CampaignPlannerArgs): string {
  return `Plan a TV advertising campaign using ADCP protocols:

🎯 Objective: ${args.objective}
👥 Target audience: ${args.target_audience}
💰 Budget: ${args.budget} MAD
📅 Duration: ${args.duration_days} days

Steps:
1. Use discover_signals to find audience signals matching the target audience
2. Use get_products to find inventory that fits the objective and budget
3. Select packages and call create_media_buy with the chosen package IDs
4. Upload creatives with sync_creatives once the media buy is confirmed
5. Track performance with get_media_buy_delivery

Provide:
- Recommended channels and time slots
- Budget allocation per package
- Expected reach and frequency`;
}

export function inventoryAnalyzerPrompt(args: InventoryAnalyzerArgs): string {
  return `Analyze TV advertising inventory using ADCP:

📺 Channel: ${args.channel}
📅 Date Range: ${args.date_from} to ${args.date_to}

Use get_products to:
1. Discover all available spots in this timeframe
2. Group by program category (news, sports, entertainment)
3. Analyze pricing patterns (prime time vs. off-peak)
4. Identify premium inventory opportunities
5. Calculate total available impressions

Provide:
- Inventory summary with availability rates
- Pricing recommendations
- Best time slots for different advertiser objectives
- Audience reach estimates`;
}
