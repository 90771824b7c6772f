const features = [
  {
    title: "Frame-by-frame Trace",
    description: "Every reference gets a row: the frames after the step, whether it faulted, and which page it pushed out.",
  },
  {
    title: "LRU vs Optimal",
    description: "Run both policies over the same reference string and sweep the frame count to see how the fault curve bends.",
  },
  {
    title: "First-fit Fragmentation",
    description: "Allocate fixed-size blocks from the lowest free address, free a random few, and measure the holes left behind.",
  },
];

export function FeatureCards() {
  return (
    <section className="grid gap-4 md:grid-cols-3">
      {features.map((feature) => (
        <div key={feature.title} className="neo-panel rounded-2xl border border-white/10 bg-zinc-950/50 p-6">
          <h2 className="text-xl font-semibold text-zinc-100">{feature.title}</h2>
          <p className="mt-3 text-sm leading-relaxed text-zinc-400">{feature.description}</p>
        </div>
      ))}
    </section>
  );
}
