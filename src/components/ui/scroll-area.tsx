"use client"

import * as React from "react"

import { cn } from "@/lib/utils"

type ScrollAreaProps = React.ComponentProps<"div"> & {
  label: string
}

/** Keyboard-focusable scroll region for long traces and tables. */
function ScrollArea({ className, label, ...props }: ScrollAreaProps) {
  return (
    <div
      role="region"
      aria-label={label}
      tabIndex={0}
      className={cn("overflow-auto focus-visible:outline focus-visible:outline-1 focus-visible:outline-sky-400", className)}
      {...props}
    />
  )
}

export { ScrollArea }
