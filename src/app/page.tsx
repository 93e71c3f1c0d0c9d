import { EmulatorPage } from "@/components/EmulatorPage";

export default function Home() {
  return <EmulatorPage />;
}
