import type { ReactNode } from "react";

interface SectionTitleProps {
  title: string;
  subtitle?: string;
  rightSlot?: ReactNode;
}

export function SectionTitle({ title, subtitle, rightSlot }: SectionTitleProps) {
  return (
    <div className="section-title">
      <div>
        <h2>{title}</h2>
        {subtitle ? <p className="section-subtitle">{subtitle}</p> : null}
      </div>
      {rightSlot ?? null}
    </div>
  );
}
