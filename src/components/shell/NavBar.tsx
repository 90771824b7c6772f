import Link from "next/link";

const navLinks = [
  { href: "/paging", label: "Page Replacement" },
  { href: "/fragmentation", label: "Fragmentation" },
];

export function NavBar() {
  return (
    <header className="sticky top-0 z-50 border-b border-white/10 bg-black/35 backdrop-blur-xl">
      <div className="mx-auto flex h-16 w-full max-w-[1320px] items-center justify-between px-4 md:px-8">
        <Link href="/" className="text-sm font-semibold tracking-[0.18em] text-zinc-100 uppercase">
          Memory Lab
        </Link>

        <nav className="flex items-center gap-6 md:gap-8">
          {navLinks.map((link) => (
            <Link
              key={link.href}
              href={link.href}
              className="text-sm text-zinc-300 transition-colors hover:text-white"
            >
              {link.label}
            </Link>
          ))}
        </nav>
      </div>
    </header>
  );
}
