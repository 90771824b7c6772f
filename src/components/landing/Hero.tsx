"use client";

import { motion } from "framer-motion";
import Link from "next/link";

export function Hero() {
  return (
    <section className="relative overflow-hidden rounded-[2.5rem] border border-white/10 bg-gradient-to-b from-zinc-950/80 via-black/80 to-zinc-900/70 px-8 py-20 text-center md:px-16 md:py-28">
      <div className="pointer-events-none absolute inset-0 opacity-50">
        <motion.div
          className="absolute -left-20 top-8 h-72 w-72 rounded-full bg-cyan-500/20 blur-3xl"
          animate={{ x: [0, 24, 0], y: [0, 8, 0] }}
          transition={{ duration: 14, repeat: Infinity, ease: "easeInOut" }}
        />
        <motion.div
          className="absolute -right-24 bottom-0 h-72 w-72 rounded-full bg-indigo-500/20 blur-3xl"
          animate={{ x: [0, -28, 0], y: [0, -12, 0] }}
          transition={{ duration: 16, repeat: Infinity, ease: "easeInOut" }}
        />
      </div>

      <div className="relative mx-auto max-w-4xl space-y-8">
        <motion.h1
          className="text-6xl font-semibold tracking-tight text-zinc-100 md:text-8xl"
          initial={{ opacity: 0, y: 20 }}
          animate={{ opacity: 1, y: 0 }}
          transition={{ duration: 0.8, ease: "easeOut" }}
        >
          Memory Lab
        </motion.h1>

        <motion.p
          className="mx-auto max-w-2xl text-lg leading-relaxed text-zinc-300 md:text-xl"
          initial={{ opacity: 0 }}
          animate={{ opacity: 1 }}
          transition={{ duration: 0.6, delay: 0.15 }}
        >
          Watch frames fill and evict under LRU and Optimal. Watch first-fit allocation leave holes behind.
        </motion.p>

        <motion.div
          className="flex flex-wrap items-center justify-center gap-3"
          initial={{ opacity: 0 }}
          animate={{ opacity: 1 }}
          transition={{ duration: 0.6, delay: 0.28 }}
        >
          <Link
            href="/paging"
            className="inline-flex h-11 items-center rounded-full bg-white px-6 text-sm font-medium text-black hover:bg-zinc-200"
          >
            Page Replacement
          </Link>
          <Link
            href="/fragmentation"
            className="inline-flex h-11 items-center rounded-full border border-white/20 bg-white/5 px-6 text-sm font-medium text-zinc-100 hover:bg-white/10"
          >
            Fragmentation
          </Link>
        </motion.div>
      </div>
    </section>
  );
}
