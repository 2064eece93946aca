import { ProgressWorkspace } from "@/components/progress/progress-workspace";

export default function HomePage() {
  return <ProgressWorkspace />;
}
