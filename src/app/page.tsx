import { CrossSellDashboard } from "@/components/dashboard/cross-sell-dashboard";

export default function HomePage() {
  return <CrossSellDashboard />;
}
