"use client";

// Yearly activity heat map — pure SVG, one column per week.
// A cell is filled with the habit colour when that day was completed.

import type { HeatmapDay } from "@/types/database";
import { cellClassName, layoutCells } from "./heatmapLayout";

interface HeatMapProps {
  days: HeatmapDay[];
  color?: string | null;
  onDayClick?: (date: string, completed: boolean) => void;
}

const DAY_LABELS = ["", "Mon", "", "Wed", "", "Fri", ""];
const EMPTY_COLOR = "#1a1a2e";
const DEFAULT_COLOR = "#10b981";

export default function HeatMap({ days, color, onDayClick }: HeatMapProps) {
  const cellSize = 12;
  const cellGap = 2;
  const totalCellSize = cellSize + cellGap;
  const leftPad = 28;
  const topPad = 16;

  const { cells, monthMarkers } = layoutCells(days);
  const totalCols = cells.length > 0 ? cells[cells.length - 1].col + 1 : 0;
  const svgWidth = leftPad + totalCols * totalCellSize + 4;
  const svgHeight = topPad + 7 * totalCellSize + 4;
  const fill = color ?? DEFAULT_COLOR;

  return (
    <div className="overflow-x-auto">
      <svg width={svgWidth} height={svgHeight} className="block">
        {monthMarkers.map((m) => (
          <text
            key={`${m.label}-${m.col}`}
            x={leftPad + m.col * totalCellSize}
            y={10}
            fill="#666"
            fontSize="9"
            fontFamily="monospace"
          >
            {m.label}
          </text>
        ))}

        {DAY_LABELS.map((label, i) => (
          label && (
            <text
              key={label}
              x={0}
              y={topPad + i * totalCellSize + cellSize - 1}
              fill="#666"
              fontSize="9"
              fontFamily="monospace"
            >
              {label}
            </text>
          )
        ))}

        {cells.map((cell) => (
          <rect
            key={cell.date}
            x={leftPad + cell.col * totalCellSize}
            y={topPad + cell.row * totalCellSize}
            width={cellSize}
            height={cellSize}
            rx={2}
            fill={cell.completed ? fill : EMPTY_COLOR}
            className={cellClassName(onDayClick !== undefined)}
            onClick={() => onDayClick?.(cell.date, cell.completed)}
          >
            <title>{cell.date}: {cell.completed ? "done" : "not done"}</title>
          </rect>
        ))}
      </svg>
    </div>
  );
}
